/**
 * Fastify application factory.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loggerConfig } from './utils/logger.js';
import { queryRoutes } from './routes/query.js';
import { cacheRoutes } from './routes/cache.js';
import { utilityRoutes, type ServiceInfo } from './routes/utility.js';
import type { Services } from './bootstrap.js';

/**
 * The services the HTTP layer talks to.
 */
export type AppServices = Pick<Services, 'pipeline' | 'policy' | 'catalog' | 'queryLog'>;

export interface AppOptions {
  /** Serve OpenAPI docs at /docs. */
  docs?: boolean;
}

/**
 * Create and configure the Fastify server.
 */
export async function buildApp(
  services: AppServices,
  info: ServiceInfo,
  options: AppOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  if (options.docs) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'querywarden API',
          description: 'Natural-language questions answered by allowlisted, read-only SQL',
          version: info.version,
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  /**
   * Register route handlers.
   */
  await fastify.register(queryRoutes, { pipeline: services.pipeline });
  await fastify.register(cacheRoutes, { pipeline: services.pipeline, policy: services.policy });
  await fastify.register(utilityRoutes, {
    policy: services.policy,
    catalog: services.catalog,
    queryLog: services.queryLog,
    info,
  });

  /**
   * Anything a route did not turn into a response is a 500 with no detail.
   */
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      return reply.status(400).send({
        error: 'BadRequest',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  return fastify;
}
