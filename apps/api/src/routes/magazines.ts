/**
 * Magazine Routes
 *
 * - GET /magazines - List magazines
 * - POST /magazines - Create a magazine
 * - GET /magazines/:id - Magazine with its issues and numbering rules
 * - GET /magazines/:id/missing - Missing issue numbers
 * - GET /magazines/:id/numberings - Numbering rules in evaluation order
 * - POST /magazines/:id/numberings - Add a numbering rule
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';

import {
  createMagazine,
  createNumbering,
  getAllMagazines,
  getIssuesByMagazineId,
  getMissingNumbers,
  listNumberings,
  requireMagazine,
} from '../entities/index.js';
import {
  CreateNumberingBodySchema,
  IdParamsSchema,
  IssueSchema,
  MagazineSchema,
  MissingNumberSchema,
  NumberingSchema,
  RuleFailureSchema,
} from './schemas.js';

// ============================================================================
// Zod Schemas
// ============================================================================

const CreateMagazineBodySchema = z.object({
  name: z.string().trim().min(1),
});

const MagazineSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  issueCount: z.number(),
  numberingCount: z.number(),
});

const MagazineListSchema = z.object({
  magazines: z.array(MagazineSummarySchema),
});

const MagazineDetailsSchema = z.object({
  magazine: MagazineSchema,
  issues: z.array(IssueSchema),
  numberings: z.array(NumberingSchema),
});

const MissingNumbersResponseSchema = z.object({
  magazine: z.object({
    id: z.string(),
    name: z.string(),
  }),
  missing: z.array(MissingNumberSchema),
  failures: z.array(RuleFailureSchema),
  totalMissing: z.number(),
});

const NumberingListSchema = z.object({
  numberings: z.array(NumberingSchema),
});

// ============================================================================
// Routes
// ============================================================================

export const magazineRoutes: FastifyPluginAsync = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get(
    '/',
    {
      schema: {
        response: {
          200: MagazineListSchema,
        },
      },
    },
    async () => {
      const magazines = await getAllMagazines();
      return {
        magazines: magazines
          .map((magazine) => ({
            id: magazine.id,
            name: magazine.name,
            issueCount: magazine.issueIds.length,
            numberingCount: magazine.numberingIds.length,
          }))
          .sort((a, b) => a.name.localeCompare(b.name)),
      };
    }
  );

  app.post(
    '/',
    {
      schema: {
        body: CreateMagazineBodySchema,
        response: {
          201: MagazineSchema,
        },
      },
    },
    async (request, reply) => {
      const magazine = await createMagazine({ name: request.body.name });
      return reply.status(201).send(magazine);
    }
  );

  app.get(
    '/:id',
    {
      schema: {
        params: IdParamsSchema,
        response: {
          200: MagazineDetailsSchema,
        },
      },
    },
    async (request) => {
      const { id } = request.params;
      const magazine = await requireMagazine(id);
      const [issues, numberings] = await Promise.all([getIssuesByMagazineId(id), listNumberings(id)]);
      return { magazine, issues, numberings };
    }
  );

  /**
   * GET /magazines/:id/missing
   *
   * Recomputed on every request from the current issues and rules. A rule
   * with an unresolvable open bound or an oversized window is listed under
   * `failures`; the gaps of the other rules are still returned.
   */
  app.get(
    '/:id/missing',
    {
      schema: {
        params: IdParamsSchema,
        response: {
          200: MissingNumbersResponseSchema,
        },
      },
    },
    async (request) => {
      const { magazine, report } = await getMissingNumbers(request.params.id);
      return {
        magazine: { id: magazine.id, name: magazine.name },
        missing: report.missing,
        failures: report.failures,
        totalMissing: report.missing.length,
      };
    }
  );

  app.get(
    '/:id/numberings',
    {
      schema: {
        params: IdParamsSchema,
        response: {
          200: NumberingListSchema,
        },
      },
    },
    async (request) => {
      return { numberings: await listNumberings(request.params.id) };
    }
  );

  app.post(
    '/:id/numberings',
    {
      schema: {
        params: IdParamsSchema,
        body: CreateNumberingBodySchema,
        response: {
          201: NumberingSchema,
        },
      },
    },
    async (request, reply) => {
      const numbering = await createNumbering({
        magazineId: request.params.id,
        ...request.body,
      });
      return reply.status(201).send(numbering);
    }
  );
};
