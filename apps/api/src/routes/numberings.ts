/**
 * Numbering Routes
 *
 * - PATCH /numberings/:id - Change a rule's bounds or mode
 * - DELETE /numberings/:id - Remove a rule
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';

import { deleteNumbering, updateNumbering } from '../entities/index.js';
import { IdParamsSchema, NumberingSchema, UpdateNumberingBodySchema } from './schemas.js';

export const numberingRoutes: FastifyPluginAsync = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.patch(
    '/:id',
    {
      schema: {
        params: IdParamsSchema,
        body: UpdateNumberingBodySchema,
        response: {
          200: NumberingSchema,
        },
      },
    },
    async (request) => {
      return updateNumbering(request.params.id, request.body);
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
      await deleteNumbering(request.params.id);
      return { success: true };
    }
  );
};
