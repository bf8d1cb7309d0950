/**
 * Catalog Routes
 *
 * - GET /issue-numbers/parse?raw= - Parse a printed issue number
 * - DELETE /catalog - Delete every magazine, issue and numbering rule
 */

import { parseIssueNumber } from '@repo/shared';
import type { FastifyPluginAsync } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';

import { deleteCatalog } from '../entities/index.js';
import { NormalizedRangeSchema } from './schemas.js';

const DeletedCatalogSchema = z.object({
  magazineCount: z.number(),
  issueCount: z.number(),
  numberingCount: z.number(),
});

export const catalogRoutes: FastifyPluginAsync = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get(
    '/issue-numbers/parse',
    {
      schema: {
        querystring: z.object({
          raw: z.string(),
        }),
        response: {
          200: NormalizedRangeSchema,
        },
      },
    },
    async (request) => {
      return parseIssueNumber(request.query.raw);
    }
  );

  app.delete(
    '/catalog',
    {
      schema: {
        response: {
          200: DeletedCatalogSchema,
        },
      },
    },
    async () => {
      return deleteCatalog();
    }
  );
};
