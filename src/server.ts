/**
 * Fastify application factory.
 */

import { fastify, type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { SqlDialect } from './services/database.js';
import type { TextGenerator } from './services/llm.js';
import type { QueryPipeline } from './services/pipeline.js';
import { queryRoutes } from './routes/query.js';
import { utilityRoutes } from './routes/utility.js';
import { loggerOptions } from './utils/logger.js';

export const API_VERSION = '0.1.0';

export interface ServerDeps {
  pipeline: QueryPipeline;
  providers: readonly TextGenerator[];
  schemaDescription: string;
  dialect: SqlDialect;
  maxQuestionLength: number;
  /** Provider used when a request names none */
  pinnedProvider?: string;
  logLevel?: string;
  /** Serve Swagger UI under /docs */
  docs?: boolean;
}

/**
 * Create and configure the Fastify server. Does not listen.
 */
export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = fastify({
    logger: loggerOptions(deps.logLevel),
  });

  await app.register(cors, {
    origin: '*',
  });

  if (deps.docs ?? true) {
    await app.register(swagger, {
      openapi: {
        info: {
          title: 'warehouse-chat API',
          description: 'Ask a SQL warehouse questions in plain language',
          version: API_VERSION,
        },
      },
    });
    await app.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  /**
   * Unexpected errors only: generation failures are part of the turn
   * response and never reach this handler.
   */
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error.validation) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      error: 'InternalServerError',
      message: error.message || 'An unexpected error occurred',
    });
  });

  await app.register(queryRoutes, {
    pipeline: deps.pipeline,
    schemaDescription: deps.schemaDescription,
    maxQuestionLength: deps.maxQuestionLength,
    pinnedProvider: deps.pinnedProvider,
  });
  await app.register(utilityRoutes, {
    providers: deps.providers,
    dialect: deps.dialect,
    version: API_VERSION,
  });

  return app;
}
