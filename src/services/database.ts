/**
 * Database service using Knex.js.
 * Supports PostgreSQL and SQLite (better-sqlite3).
 *
 * Two things live here: live schema introspection for the catalog, and the
 * read-only channel the bounded executor runs sanitized queries through.
 */

import { knex, type Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import { DatabaseError, describeError } from '../types/errors.js';
import { isRecord } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import type { IntrospectedTable, SchemaIntrospector } from './schema-catalog.js';

/**
 * Raw rows as returned by the driver, before JSON conversion.
 */
export interface RawResult {
  columns: string[];
  rows: Record<string, unknown>[];
}

/**
 * Read-only, deadline-bounded access to the database.
 */
export interface DatabaseChannel {
  /**
   * Run one statement inside a read-only transaction.
   *
   * @throws DatabaseError
   */
  runReadOnly(sql: string, timeoutMs: number): Promise<RawResult>;
}

/**
 * Create a Knex instance from configuration.
 */
export function createDatabase(knexConfig: Knex.Config): Knex {
  const db = knex(knexConfig);
  logger.info(`Database client created: ${String(knexConfig.client)}`);
  return db;
}

/**
 * Close a Knex instance and its pool.
 */
export async function closeDatabase(db: Knex): Promise<void> {
  await db.destroy();
  logger.info('Database connection closed');
}

function clientName(db: Knex): string {
  const client: unknown = db.client.config.client;
  return typeof client === 'string' ? client : 'unknown';
}

/**
 * Catalog source backed by knex-schema-inspector.
 */
export class KnexSchemaIntrospector implements SchemaIntrospector {
  private readonly inspector: ReturnType<typeof SchemaInspector>;

  constructor(db: Knex) {
    this.inspector = SchemaInspector(db);
  }

  async introspect(): Promise<IntrospectedTable[]> {
    const tables = await this.inspector.tables();

    // Fetch all table schemas in parallel
    return Promise.all(
      tables.map(async (name) => {
        const columns = await this.inspector.columnInfo(name);
        return {
          name,
          columns: columns.map((col) => ({ name: col.name, dataType: col.data_type })),
        };
      })
    );
  }
}

/**
 * Knex returns different result structures per dialect.
 */
export function readRawResult(result: unknown): RawResult {
  // PostgreSQL: { rows: [...], fields: [...] }
  if (isRecord(result) && Array.isArray(result.rows)) {
    const rows = result.rows.filter(isRecord);
    const fields = Array.isArray(result.fields) ? result.fields : [];
    const columns = fields.flatMap((field) =>
      isRecord(field) && typeof field.name === 'string' ? [field.name] : []
    );
    return { columns: columns.length > 0 ? columns : Object.keys(rows[0] ?? {}), rows };
  }

  // SQLite: array of rows
  if (Array.isArray(result)) {
    const rows = result.filter(isRecord);
    return { columns: Object.keys(rows[0] ?? {}), rows };
  }

  return { columns: [], rows: [] };
}

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EPIPE']);

/**
 * Map a driver error onto the channel's failure categories.
 */
export function classifyDatabaseError(error: unknown): DatabaseError {
  if (error instanceof DatabaseError) {
    return error;
  }

  const detail = describeError(error);
  const code = isRecord(error) && typeof error.code === 'string' ? error.code : '';
  const name = error instanceof Error ? error.name : '';

  // 57014: query_canceled (statement_timeout)
  if (code === '57014') {
    return new DatabaseError('Timeout', detail);
  }
  // Pool acquisition timeouts, socket errors, SQLSTATE class 08
  if (name === 'KnexTimeoutError' || CONNECTION_CODES.has(code) || code.startsWith('08')) {
    return new DatabaseError('ConnectionError', detail);
  }
  return new DatabaseError('RejectedByDatabase', detail);
}

/**
 * Channel that opens a transaction read-only at the database level before
 * running the statement.
 */
export class KnexChannel implements DatabaseChannel {
  private readonly client: string;

  constructor(private readonly db: Knex) {
    this.client = clientName(db);
  }

  async runReadOnly(sql: string, timeoutMs: number): Promise<RawResult> {
    try {
      return await this.db.transaction(async (trx) => {
        if (this.client === 'pg') {
          return this.runPostgres(trx, sql, timeoutMs);
        }
        return this.runSqlite(trx, sql, timeoutMs);
      });
    } catch (error) {
      throw classifyDatabaseError(error);
    }
  }

  private async runPostgres(trx: Knex.Transaction, sql: string, timeoutMs: number): Promise<RawResult> {
    await trx.raw('SET TRANSACTION READ ONLY');
    await trx.raw('SELECT set_config(?, ?, true)', ['statement_timeout', String(timeoutMs)]);
    return readRawResult(await trx.raw(sql));
  }

  /**
   * better-sqlite3 blocks the thread while a statement runs, so nothing can
   * cut it short here; an overrun is still reported as a timeout. File
   * databases go through SqliteWorkerChannel instead.
   */
  private async runSqlite(trx: Knex.Transaction, sql: string, timeoutMs: number): Promise<RawResult> {
    await trx.raw('PRAGMA query_only = ON');
    const started = Date.now();
    try {
      const result = readRawResult(await trx.raw(sql));
      const elapsed = Date.now() - started;
      if (elapsed > timeoutMs) {
        throw new DatabaseError('Timeout', `SQLite statement took ${elapsed}ms, over the ${timeoutMs}ms deadline`);
      }
      return result;
    } finally {
      await trx.raw('PRAGMA query_only = OFF');
    }
  }
}
