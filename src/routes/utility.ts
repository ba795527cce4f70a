/**
 * Utility endpoints (health, providers).
 */

import type { FastifyInstance } from 'fastify';
import type { SqlDialect } from '../services/database.js';
import { describeProviders, type TextGenerator } from '../services/llm.js';

export interface UtilityRouteOptions {
  providers: readonly TextGenerator[];
  dialect: SqlDialect;
  version: string;
}

export async function utilityRoutes(fastify: FastifyInstance, options: UtilityRouteOptions) {
  const { providers, dialect, version } = options;

  // GET /providers - Configured providers in priority order
  fastify.get('/providers', async () => {
    const statuses = await describeProviders(providers);
    return { providers: statuses, total: statuses.length };
  });

  // GET /health - Health check
  fastify.get('/health', async () => {
    return {
      status: 'ok',
      database: { dialect },
      providers: providers.map((p) => p.name),
    };
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'warehouse-chat',
      version,
      description: 'Ask questions about a SQL warehouse in plain language',
      docs: '/docs',
    };
  });
}
