/**
 * Issue Routes
 *
 * - GET /issues - List issues (filters: magazineId, year, number, duplicates, isNew)
 * - POST /issues - Add an issue
 * - PATCH /issues/:id - Edit an issue (re-parses a changed number)
 * - DELETE /issues/new - Delete issues still flagged as new
 * - DELETE /issues/:id - Delete an issue
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';

import {
  createIssue,
  deleteIssue,
  deleteNewIssues,
  listIssues,
  updateIssue,
} from '../entities/index.js';
import { BooleanQuerySchema, IdParamsSchema, IssueSchema } from './schemas.js';

// ============================================================================
// Zod Schemas
// ============================================================================

const IssueListQuerySchema = z.object({
  magazineId: z.string().optional(),
  year: z.coerce.number().int().optional(),
  number: z.string().optional(),
  duplicates: BooleanQuerySchema.optional(),
  isNew: BooleanQuerySchema.optional(),
});

const IssueListSchema = z.object({
  issues: z.array(IssueSchema),
  totalCount: z.number(),
});

const CreateIssueBodySchema = z.object({
  magazineId: z.string().min(1),
  year: z.number().int().nullable().optional(),
  issueNumber: z.string().trim().min(1),
  copies: z.number().int().positive().optional(),
  isNew: z.boolean().optional(),
});

const UpdateIssueBodySchema = CreateIssueBodySchema.omit({ magazineId: true }).partial();

// ============================================================================
// Routes
// ============================================================================

export const issueRoutes: FastifyPluginAsync = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get(
    '/',
    {
      schema: {
        querystring: IssueListQuerySchema,
        response: {
          200: IssueListSchema,
        },
      },
    },
    async (request) => {
      const issues = await listIssues(request.query);
      return { issues, totalCount: issues.length };
    }
  );

  app.post(
    '/',
    {
      schema: {
        body: CreateIssueBodySchema,
        response: {
          201: IssueSchema,
        },
      },
    },
    async (request, reply) => {
      const issue = await createIssue(request.body);
      return reply.status(201).send(issue);
    }
  );

  app.patch(
    '/:id',
    {
      schema: {
        params: IdParamsSchema,
        body: UpdateIssueBodySchema,
        response: {
          200: IssueSchema,
        },
      },
    },
    async (request) => {
      return updateIssue(request.params.id, request.body);
    }
  );

  app.delete(
    '/new',
    {
      schema: {
        querystring: z.object({
          magazineId: z.string().optional(),
        }),
        response: {
          200: z.object({ deletedCount: z.number() }),
        },
      },
    },
    async (request) => {
      const deletedCount = await deleteNewIssues(request.query.magazineId);
      return { deletedCount };
    }
  );

  app.delete(
    '/:id',
    {
      schema: {
        params: IdParamsSchema,
        response: {
          200: z.object({ success: z.boolean() }),
        },
      },
    },
    async (request) => {
      await deleteIssue(request.params.id);
      return { success: true };
    }
  );
};
