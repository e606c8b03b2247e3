import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import { BoundedExecutor } from '../../src/services/executor.js';
import { SqliteWorkerChannel } from '../../src/services/sqlite-channel.js';
import { DatabaseError } from '../../src/types/errors.js';

// 400 rows cross-joined three ways: 64 million combinations to count
const SLOW_COUNT = 'SELECT count(*) AS n FROM t a, t b, t c';

async function channelFailure(channel: SqliteWorkerChannel, sql: string, timeoutMs: number): Promise<DatabaseError> {
  try {
    await channel.runReadOnly(sql, timeoutMs);
  } catch (error) {
    if (error instanceof DatabaseError) return error;
    throw error;
  }
  throw new Error('expected the statement to fail');
}

describe('SqliteWorkerChannel', () => {
  let dir: string;
  let path: string;
  let channel: SqliteWorkerChannel;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'querywarden-sqlite-'));
    path = join(dir, 'warehouse.db');
    const db = new Database(path);
    db.exec(`
      CREATE TABLE t (x INTEGER);
      WITH RECURSIVE s(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM s WHERE x < 400)
      INSERT INTO t SELECT x FROM s;
    `);
    db.close();
    channel = new SqliteWorkerChannel(path);
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should run a read-only query', async () => {
    expect(await channel.runReadOnly('SELECT x FROM t ORDER BY x LIMIT 2', 5000)).toEqual({
      columns: ['x'],
      rows: [{ x: 1 }, { x: 2 }],
    });
  });

  it('should report columns of an empty result', async () => {
    expect(await channel.runReadOnly('SELECT x FROM t WHERE x < 0', 5000)).toEqual({ columns: ['x'], rows: [] });
  });

  it('should refuse writes at the database level', async () => {
    const error = await channelFailure(channel, 'DELETE FROM t', 5000);

    expect(error.kind).toBe('RejectedByDatabase');
    const check = new Database(path, { readonly: true });
    expect(check.prepare('SELECT count(*) AS n FROM t').get()).toEqual({ n: 400 });
    check.close();
  });

  it('should stop a slow statement at the deadline without blocking the event loop', async () => {
    let ticks = 0;
    const ticker = setInterval(() => {
      ticks++;
    }, 5);

    const error = await channelFailure(channel, SLOW_COUNT, 50).finally(() => {
      clearInterval(ticker);
    });

    expect(error.kind).toBe('Timeout');
    expect(error.detail).toBe('SQLite statement exceeded 50ms deadline');
    expect(ticks).toBeGreaterThan(0);
  });

  it('should let the executor report the slow statement as a timeout', async () => {
    const executor = new BoundedExecutor(channel, { statementTimeoutMs: 50, maxRows: 100 });

    const outcome = await executor.run({ status: 'accepted', sanitizedSql: SLOW_COUNT, tables: ['t'] });

    expect(outcome).toMatchObject({ status: 'failed', failure: { kind: 'Timeout' } });
  });
});
