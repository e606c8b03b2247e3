/**
 * SQLite channel that runs each statement on its own worker thread.
 *
 * better-sqlite3 executes synchronously, so a statement run on the main
 * thread blocks the event loop and no timer can interrupt it. Here the
 * worker opens the database file read-only and is terminated when the
 * deadline passes; the caller is answered immediately either way.
 */

import { createRequire } from 'module';
import { Worker } from 'worker_threads';
import { z } from 'zod';
import { DatabaseError, describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { DatabaseChannel, RawResult } from './database.js';

// Runs as a CommonJS script inside the worker.
const WORKER_SOURCE = `
const { parentPort, workerData } = require('worker_threads');
const Database = require(workerData.driver);
let db;
try {
  db = new Database(workerData.filename, { readonly: true, fileMustExist: true });
  db.pragma('query_only = ON');
  const statement = db.prepare(workerData.sql);
  if (statement.reader) {
    const columns = statement.columns().map((column) => column.name);
    const rows = [];
    for (const row of statement.iterate()) rows.push(row);
    parentPort.postMessage({ ok: true, columns, rows });
  } else {
    statement.run();
    parentPort.postMessage({ ok: true, columns: [], rows: [] });
  }
} catch (error) {
  parentPort.postMessage({
    ok: false,
    message: error instanceof Error ? error.message : String(error),
    code: error && typeof error.code === 'string' ? error.code : '',
  });
} finally {
  if (db) db.close();
}
`;

const WorkerReplySchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), columns: z.array(z.string()), rows: z.array(z.record(z.unknown())) }),
  z.object({ ok: z.literal(false), message: z.string(), code: z.string() }),
]);

const CONNECTION_CODES = new Set(['SQLITE_CANTOPEN', 'SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_NOTADB']);

function readReply(message: unknown): RawResult | DatabaseError {
  const reply = WorkerReplySchema.safeParse(message);
  if (!reply.success) {
    return new DatabaseError('RejectedByDatabase', 'Unreadable reply from the SQLite worker');
  }
  if (reply.data.ok) {
    return { columns: reply.data.columns, rows: reply.data.rows };
  }
  const kind = CONNECTION_CODES.has(reply.data.code) ? 'ConnectionError' : 'RejectedByDatabase';
  return new DatabaseError(kind, reply.data.message);
}

export class SqliteWorkerChannel implements DatabaseChannel {
  private readonly driver: string;

  constructor(private readonly filename: string) {
    this.driver = createRequire(import.meta.url).resolve('better-sqlite3');
  }

  runReadOnly(sql: string, timeoutMs: number): Promise<RawResult> {
    return new Promise<RawResult>((resolve, reject) => {
      const worker = new Worker(WORKER_SOURCE, {
        eval: true,
        workerData: { driver: this.driver, filename: this.filename, sql },
      });
      let timer: NodeJS.Timeout | undefined;
      let settled = false;

      const settle = (outcome: RawResult | DatabaseError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (outcome instanceof DatabaseError) {
          reject(outcome);
        } else {
          resolve(outcome);
        }
        // A statement stuck inside SQLite stops once control returns to the worker's JS.
        worker.terminate().catch((error: unknown) => {
          logger.debug(`SQLite worker did not terminate cleanly: ${describeError(error)}`);
        });
      };

      timer = setTimeout(() => {
        settle(new DatabaseError('Timeout', `SQLite statement exceeded ${timeoutMs}ms deadline`));
      }, timeoutMs);

      worker.once('message', (message: unknown) => settle(readReply(message)));
      worker.once('error', (error: Error) => settle(new DatabaseError('ConnectionError', describeError(error))));
      worker.once('exit', (code: number) => {
        settle(new DatabaseError('ConnectionError', `SQLite worker exited with code ${code}`));
      });
    });
  }
}
