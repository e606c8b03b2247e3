#!/usr/bin/env node
/**
 * querywarden CLI
 * Serve the API, ask questions in-process, and check SQL against the safety rules
 */

import { cac } from 'cac';
import { z } from 'zod';
import * as logger from './cli/logger.js';
import type { Identity, QuestionResponse } from './types/models.js';
import { describeError } from './types/errors.js';
import { SERVICE_VERSION } from './version.js';

const cli = cac('querywarden');

cli.version(SERVICE_VERSION);
cli.help();

const DEFAULT_URL = 'http://localhost:8000';

interface IdentityOptions {
  user: string;
  role: string;
}

const CacheStatsSchema = z.object({
  entry_count: z.number(),
  max_entries: z.number(),
  ttl_seconds: z.number(),
  hit_count: z.number(),
  miss_count: z.number(),
  eviction_count: z.number(),
});

const ErrorBodySchema = z.object({ message: z.string() });

function identityHeaders(options: IdentityOptions): Record<string, string> {
  return { 'x-user-id': options.user, 'x-user-role': options.role };
}

async function readError(response: Response): Promise<string> {
  const body = ErrorBodySchema.safeParse(await response.json().catch(() => null));
  return body.success ? body.data.message : `HTTP ${response.status}`;
}

function printResponse(result: QuestionResponse): void {
  if (result.status === 'ok') {
    logger.box(result.sql, result.cache_hit ? 'SQL (cached)' : `SQL (${result.source ?? 'unknown'})`);
    logger.table(result.columns, result.rows);
    logger.newline();
    logger.success(`${result.row_count} row(s)`);
    if (result.explanation) {
      logger.info(result.explanation);
    }
    return;
  }

  if (result.sql) {
    logger.box(result.sql, 'Rejected SQL');
  }
  const hint = result.permitted_tables ? `Permitted tables: ${result.permitted_tables.join(', ')}` : undefined;
  logger.error(`${result.kind} (${result.reject_reason}): ${result.message}`, hint);
}

/**
 * querywarden serve
 * Start the HTTP API
 */
cli
  .command('serve', 'Start the HTTP API server')
  .option('-p, --port <port>', 'Server port (overrides PORT)')
  .action(async (options: { port?: number }) => {
    logger.printBanner();
    if (options.port !== undefined) {
      process.env.PORT = String(options.port);
    }
    const { startServer } = await import('./index.js');
    await startServer();
  });

/**
 * querywarden ask "<question>"
 * Run one question through the pipeline without starting a server
 */
cli
  .command('ask <question>', 'Answer a question in-process')
  .option('--user <id>', 'Caller user id', { default: 'cli' })
  .option('--role <role>', 'Caller role', { default: 'analyst' })
  .option('--json', 'Print the raw response as JSON')
  .action(async (question: string, options: IdentityOptions & { json?: boolean }) => {
    const { config } = await import('./config.js');
    const { createServices, closeServices } = await import('./bootstrap.js');
    const services = createServices(config);
    const identity: Identity = { userId: options.user, role: options.role };

    const spin = options.json ? null : logger.spinner('Thinking...');
    try {
      const result = await services.pipeline.handleQuestion(identity, question);
      spin?.stop();
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        printResponse(result);
      }
      process.exitCode = result.status === 'ok' ? 0 : 1;
    } finally {
      spin?.stop();
      await closeServices(services);
    }
  });

/**
 * querywarden check "<sql>"
 * Validate SQL for a role against the live schema without executing it
 */
cli
  .command('check <sql>', 'Run the safety validator on SQL for a role')
  .option('--role <role>', 'Role whose table allowlist applies', { default: 'analyst' })
  .action(async (sql: string, options: { role: string }) => {
    const { config } = await import('./config.js');
    const { createServices, closeServices } = await import('./bootstrap.js');
    const { validateCandidate } = await import('./services/validator/index.js');
    const services = createServices(config);

    try {
      const snapshot = await services.catalog.refresh();
      const scope = services.policy.scope(options.role, snapshot);
      const verdict = validateCandidate(sql, scope.allowedTables, {
        maxLimit: config.MAX_LIMIT,
        defaultLimit: config.DEFAULT_LIMIT,
      });

      if (verdict.status === 'accepted') {
        logger.success('Accepted');
        if (verdict.sanitizedSql !== sql.trim()) {
          logger.warn(`No row limit given; LIMIT ${config.DEFAULT_LIMIT} was appended`);
        }
        logger.box(verdict.sanitizedSql, 'Sanitized SQL');
        logger.row('Tables', verdict.tables.join(', ') || '(none)');
        process.exitCode = 0;
      } else {
        const { rejection } = verdict;
        logger.error(`${rejection.reason}: ${rejection.message}`, rejection.offendingFragment);
        process.exitCode = 1;
      }
    } finally {
      await closeServices(services);
    }
  });

/**
 * querywarden stats
 * Show result cache statistics of a running server
 */
cli
  .command('stats', 'Show result cache statistics')
  .option('--url <url>', 'Server URL', { default: DEFAULT_URL })
  .option('--user <id>', 'Caller user id', { default: 'cli' })
  .option('--role <role>', 'Caller role', { default: 'admin' })
  .action(async (options: IdentityOptions & { url: string }) => {
    const response = await fetch(`${options.url}/cache/stats`, { headers: identityHeaders(options) });
    if (!response.ok) {
      throw new Error(await readError(response));
    }

    const stats = CacheStatsSchema.parse(await response.json());
    const lookups = stats.hit_count + stats.miss_count;
    const hitRate = lookups > 0 ? ((stats.hit_count / lookups) * 100).toFixed(1) : '0.0';

    logger.section('Result Cache');
    logger.row('Entries', `${stats.entry_count} / ${stats.max_entries}`);
    logger.row('TTL', `${stats.ttl_seconds}s`);
    logger.row('Hits', String(stats.hit_count));
    logger.row('Misses', String(stats.miss_count));
    logger.row('Evictions', String(stats.eviction_count));
    logger.row('Hit rate', `${hitRate}%`);
  });

/**
 * querywarden clear-cache
 * Clear the result cache of a running server (admin roles only)
 */
cli
  .command('clear-cache', 'Clear the result cache')
  .option('--url <url>', 'Server URL', { default: DEFAULT_URL })
  .option('--user <id>', 'Caller user id', { default: 'cli' })
  .option('--role <role>', 'Caller role', { default: 'admin' })
  .action(async (options: IdentityOptions & { url: string }) => {
    const response = await fetch(`${options.url}/cache/clear`, {
      method: 'POST',
      headers: identityHeaders(options),
    });
    if (!response.ok) {
      throw new Error(await readError(response));
    }

    const body = z.object({ cleared: z.number() }).parse(await response.json());
    logger.success(`Cleared ${body.cleared} cached result(s)`);
  });

try {
  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
} catch (err) {
  logger.error(describeError(err));
  process.exit(1);
}
