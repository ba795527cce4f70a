/**
 * Query endpoints for natural language questions.
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import type { TurnResponse } from '../types/models.js';
import type { QueryPipeline } from '../services/pipeline.js';

export interface QueryRouteOptions {
  pipeline: QueryPipeline;
  schemaDescription: string;
  maxQuestionLength: number;
  /** Provider used when a request names none */
  pinnedProvider?: string;
}

interface QueryBody {
  question: string;
  provider?: string;
  schema_description?: string;
}

interface QueryString {
  q: string;
  provider?: string;
}

/**
 * HTTP status for a turn: generation failures keep their response body but
 * are not reported as success.
 */
export function statusFor(response: TurnResponse): number {
  switch (response.error?.kind) {
    case undefined:
      return 200;
    case 'ProviderUnavailable':
      return 503;
    case 'ProviderFailed':
      return 502;
    case 'Unparseable':
    case 'Unsafe':
      return 422;
    case 'QuestionTooLong':
      return 400;
    case 'ExecutionFailed':
    default:
      return 500;
  }
}

function send(reply: FastifyReply, response: TurnResponse): FastifyReply {
  return reply.status(statusFor(response)).send(response);
}

export async function queryRoutes(fastify: FastifyInstance, options: QueryRouteOptions) {
  const { pipeline, schemaDescription, maxQuestionLength, pinnedProvider } = options;

  // POST /query - Main query endpoint
  fastify.post<{ Body: QueryBody }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question',
        body: {
          type: 'object',
          properties: {
            question: { type: 'string', minLength: 1, maxLength: maxQuestionLength },
            provider: { type: 'string' },
            schema_description: { type: 'string' },
          },
          required: ['question'],
        },
      },
    },
    async (request, reply) => {
      const { question, provider, schema_description } = request.body;
      const response = await pipeline.handleTurn(
        question,
        schema_description ?? schemaDescription,
        provider ?? pinnedProvider
      );
      return send(reply, response);
    }
  );

  // GET /query - Convenience endpoint
  fastify.get<{ Querystring: QueryString }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question (GET)',
        querystring: {
          type: 'object',
          properties: {
            q: { type: 'string', minLength: 1, maxLength: maxQuestionLength },
            provider: { type: 'string' },
          },
          required: ['q'],
        },
      },
    },
    async (request, reply) => {
      const response = await pipeline.handleTurn(
        request.query.q,
        schemaDescription,
        request.query.provider ?? pinnedProvider
      );
      return send(reply, response);
    }
  );
}
