/**
 * querywarden server - main entry point
 */

import { pathToFileURL } from 'url';
import { config } from './config.js';
import { buildApp } from './app.js';
import { closeServices, createServices } from './bootstrap.js';
import { describeError } from './types/errors.js';
import { logger } from './utils/logger.js';
import { SERVICE_NAME, SERVICE_VERSION } from './version.js';

/**
 * Build services, warm the schema catalog and start listening.
 */
export async function startServer(): Promise<void> {
  const services = createServices(config);
  const fastify = await buildApp(
    services,
    {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      databaseClient: String(config.KNEX_CONFIG.client),
      generationMode: config.GENERATION_MODE,
    },
    { docs: true }
  );

  fastify.addHook('onReady', async () => {
    logger.info('Starting querywarden API server...');
    try {
      const snapshot = await services.catalog.refresh();
      logger.info(`Schema catalog ready: ${snapshot.tables.size} tables`);
    } catch (error) {
      // Requests retry the refresh; they are rejected until it succeeds
      logger.warn(`Schema catalog not ready at start-up: ${describeError(error).split('\n')[0]}`);
    }
  });

  fastify.addHook('onClose', async () => {
    logger.info('Shutting down querywarden API server...');
    await closeServices(services);
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }

  try {
    await fastify.listen({ port: config.PORT, host: config.HOST });
    logger.info(`Server running at http://localhost:${config.PORT}`);
    logger.info(`API docs at http://localhost:${config.PORT}/docs`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Start when run directly (node dist/index.js); the CLI imports startServer instead
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await startServer();
}
