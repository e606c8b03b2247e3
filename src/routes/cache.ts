/**
 * Result cache endpoints.
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import type { AccessPolicy } from '../services/access-policy.js';
import type { QueryPipeline } from '../services/pipeline.js';
import { requireIdentity } from './identity.js';

export interface CacheRoutesOptions extends FastifyPluginOptions {
  pipeline: QueryPipeline;
  policy: AccessPolicy;
}

export async function cacheRoutes(fastify: FastifyInstance, options: CacheRoutesOptions) {
  const { pipeline, policy } = options;

  // GET /cache/stats - Entry count, capacity and hit/miss/eviction counters
  fastify.get('/cache/stats', async (request, reply) => {
    if (!requireIdentity(request, reply)) return reply;
    return pipeline.cacheStats();
  });

  // POST /cache/clear - Admin roles only
  fastify.post('/cache/clear', async (request, reply) => {
    const identity = requireIdentity(request, reply);
    if (!identity) return reply;

    if (!policy.isAdmin(identity.role)) {
      return reply.status(403).send({
        error: 'Forbidden',
        message: `Role '${identity.role}' may not clear the result cache`,
      });
    }

    const cleared = pipeline.clearCache();
    request.log.info({ user: identity.userId, cleared }, 'Result cache cleared');
    return { cleared };
  });
}
