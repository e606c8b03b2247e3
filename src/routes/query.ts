/**
 * Question endpoint: natural language in, rows or a structured rejection out.
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import type { QuestionResponse, QueryRequest } from '../types/models.js';
import type { QueryPipeline } from '../services/pipeline.js';
import { requireIdentity } from './identity.js';

export interface QueryRoutesOptions extends FastifyPluginOptions {
  pipeline: QueryPipeline;
}

/**
 * HTTP status for a pipeline response.
 */
export function statusFor(response: QuestionResponse): number {
  if (response.status === 'ok') return 200;
  if (response.reject_reason === 'CatalogUnavailable') return 503;
  switch (response.kind) {
    case 'ValidationRejected':
      return 400;
    case 'TemplateUnmatched':
      return 422;
    case 'ExecutionTimeout':
      return 504;
    case 'ExecutionFailure':
      return 500;
  }
}

export async function queryRoutes(fastify: FastifyInstance, options: QueryRoutesOptions) {
  const { pipeline } = options;

  // POST /query - Main query endpoint
  fastify.post<{ Body: QueryRequest }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question with rows from an allowlisted, read-only query',
        headers: {
          type: 'object',
          properties: {
            'x-user-id': { type: 'string' },
            'x-user-role': { type: 'string' },
          },
        },
        body: {
          type: 'object',
          properties: {
            question: { type: 'string' },
          },
          required: ['question'],
        },
      },
    },
    async (request, reply) => {
      const identity = requireIdentity(request, reply);
      if (!identity) return reply;

      const result = await pipeline.handleQuestion(identity, request.body.question);
      return reply.status(statusFor(result)).send(result);
    }
  );
}
