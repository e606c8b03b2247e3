/**
 * Utility endpoints (audit log, health, root).
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { LogsQuerySchema } from '../types/models.js';
import type { AccessPolicy } from '../services/access-policy.js';
import type { QueryLog } from '../services/query-log.js';
import type { SchemaCatalog } from '../services/schema-catalog.js';
import { describeError } from '../types/errors.js';
import { requireIdentity } from './identity.js';

export interface ServiceInfo {
  name: string;
  version: string;
  databaseClient: string;
  generationMode: string;
}

export interface UtilityRoutesOptions extends FastifyPluginOptions {
  policy: AccessPolicy;
  catalog: SchemaCatalog;
  queryLog: QueryLog;
  info: ServiceInfo;
}

export async function utilityRoutes(fastify: FastifyInstance, options: UtilityRoutesOptions) {
  const { policy, catalog, queryLog, info } = options;

  // GET /logs - Recent questions, newest first (admin roles only)
  fastify.get<{ Querystring: { limit?: string } }>('/logs', async (request, reply) => {
    const identity = requireIdentity(request, reply);
    if (!identity) return reply;

    if (!policy.isAdmin(identity.role)) {
      return reply.status(403).send({
        error: 'Forbidden',
        message: `Role '${identity.role}' may not read the query log`,
      });
    }

    const parsed = LogsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'BadRequest',
        message: 'limit must be an integer between 1 and 1000',
      });
    }

    const logs = queryLog.recent(parsed.data.limit);
    return { logs, count: logs.length };
  });

  // GET /health - Health check
  fastify.get('/health', async (_request, reply) => {
    try {
      const snapshot = await catalog.getSnapshot();
      return {
        status: 'ok',
        database: { client: info.databaseClient, tables: snapshot.tables.size },
        generation_mode: info.generationMode,
      };
    } catch (error) {
      fastify.log.warn(`Health check failed: ${describeError(error).split('\n')[0]}`);
      return reply.status(503).send({
        status: 'unavailable',
        database: { client: info.databaseClient, tables: 0 },
        generation_mode: info.generationMode,
      });
    }
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: info.name,
      version: info.version,
      description: 'Natural-language questions answered by allowlisted, read-only SQL',
      docs: '/docs',
    };
  });
}
