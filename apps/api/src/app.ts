import Fastify, { type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';

import { env } from './config/env.js';
import {
  DuplicateIssueError,
  DuplicateMagazineError,
  EntityNotFoundError,
  getStoreStats,
} from './entities/index.js';
import { catalogRoutes } from './routes/catalog.js';
import { issueRoutes } from './routes/issues.js';
import { magazineRoutes } from './routes/magazines.js';
import { numberingRoutes } from './routes/numberings.js';

export interface BuildAppOptions {
  /** Set to false to silence request logging (tests) */
  logger?: boolean | undefined;
}

export function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({
    logger: options.logger === false ? false : { level: env.logLevel },
  }).withTypeProvider<ZodTypeProvider>();

  // Allow any origin so presentation clients on the local network can connect
  app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE'],
  });

  // Set up Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof EntityNotFoundError) {
      return reply.status(404).send({ error: 'not_found', message: error.message });
    }

    if (error instanceof DuplicateIssueError || error instanceof DuplicateMagazineError) {
      return reply.status(409).send({ error: 'duplicate', message: error.message });
    }

    if (error.validation) {
      return reply.status(400).send({ error: 'validation_failed', message: error.message });
    }

    request.log.error(error, 'Request failed');
    return reply.status(500).send({ error: 'internal_error', message: error.message });
  });

  // Health check
  app.get('/health', async () => {
    return { status: 'ok', ...(await getStoreStats()) };
  });

  app.register(catalogRoutes);
  app.register(magazineRoutes, { prefix: '/magazines' });
  app.register(issueRoutes, { prefix: '/issues' });
  app.register(numberingRoutes, { prefix: '/numberings' });

  return app;
}
