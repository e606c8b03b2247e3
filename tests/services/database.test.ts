import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { knex, type Knex } from 'knex';
import { KnexChannel, classifyDatabaseError, readRawResult } from '../../src/services/database.js';
import { DatabaseError } from '../../src/types/errors.js';

function coded(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

async function channelFailure(channel: KnexChannel, sql: string, timeoutMs = 1000): Promise<DatabaseError> {
  try {
    await channel.runReadOnly(sql, timeoutMs);
  } catch (error) {
    if (error instanceof DatabaseError) return error;
    throw error;
  }
  throw new Error('expected the statement to fail');
}

describe('readRawResult', () => {
  it('should read PostgreSQL results with field metadata', () => {
    expect(readRawResult({ rows: [{ a: 1, b: 'x' }], fields: [{ name: 'a' }, { name: 'b' }] })).toEqual({
      columns: ['a', 'b'],
      rows: [{ a: 1, b: 'x' }],
    });
  });

  it('should keep PostgreSQL columns for an empty result', () => {
    expect(readRawResult({ rows: [], fields: [{ name: 'a' }] })).toEqual({ columns: ['a'], rows: [] });
  });

  it('should read SQLite row arrays', () => {
    expect(readRawResult([{ id: 1 }, { id: 2 }])).toEqual({ columns: ['id'], rows: [{ id: 1 }, { id: 2 }] });
  });

  it('should read anything else as empty', () => {
    expect(readRawResult(undefined)).toEqual({ columns: [], rows: [] });
  });
});

describe('classifyDatabaseError', () => {
  it('should map statement cancellation to a timeout', () => {
    const error = classifyDatabaseError(coded('canceling statement due to statement timeout', '57014'));

    expect(error.kind).toBe('Timeout');
    expect(error.detail).toBe('canceling statement due to statement timeout');
  });

  it('should map socket and connection-class errors to connection errors', () => {
    expect(classifyDatabaseError(coded('connect ECONNREFUSED', 'ECONNREFUSED')).kind).toBe('ConnectionError');
    expect(classifyDatabaseError(coded('connection failure', '08006')).kind).toBe('ConnectionError');

    const poolTimeout = new Error('Knex: Timeout acquiring a connection');
    poolTimeout.name = 'KnexTimeoutError';
    expect(classifyDatabaseError(poolTimeout).kind).toBe('ConnectionError');
  });

  it('should map everything else to a database rejection', () => {
    expect(classifyDatabaseError(new Error('no such column: secret')).kind).toBe('RejectedByDatabase');
    expect(classifyDatabaseError('weird').kind).toBe('RejectedByDatabase');
  });

  it('should pass channel errors through', () => {
    const original = new DatabaseError('Timeout', 'late');
    expect(classifyDatabaseError(original)).toBe(original);
  });
});

describe('KnexChannel (SQLite)', () => {
  let db: Knex;
  let channel: KnexChannel;

  beforeAll(async () => {
    db = knex({
      client: 'better-sqlite3',
      connection: { filename: ':memory:' },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 },
    });
    await db.schema.createTable('sales', (table) => {
      table.integer('id');
      table.string('region');
      table.float('amount');
    });
    await db('sales').insert([
      { id: 1, region: 'east', amount: 10 },
      { id: 2, region: 'west', amount: 5 },
      { id: 3, region: 'east', amount: 2.5 },
    ]);
    channel = new KnexChannel(db);
  });

  afterAll(async () => {
    await db.destroy();
  });

  it('should run a read-only query', async () => {
    expect(await channel.runReadOnly('SELECT region, amount FROM sales ORDER BY id LIMIT 2', 1000)).toEqual({
      columns: ['region', 'amount'],
      rows: [
        { region: 'east', amount: 10 },
        { region: 'west', amount: 5 },
      ],
    });
  });

  it('should refuse writes at the database level', async () => {
    const error = await channelFailure(channel, 'DELETE FROM sales');

    expect(error.kind).toBe('RejectedByDatabase');
    expect(await db('sales').count({ n: '*' })).toEqual([{ n: 3 }]);
  });

  it('should report unknown columns as database rejections', async () => {
    const error = await channelFailure(channel, 'SELECT secret FROM sales');

    expect(error.kind).toBe('RejectedByDatabase');
  });

  it('should leave the connection writable for other callers', async () => {
    await channel.runReadOnly('SELECT 1 AS one', 1000);
    await db('sales').insert({ id: 4, region: 'north', amount: 1 });

    expect(await db('sales').count({ n: '*' })).toEqual([{ n: 4 }]);
    await db('sales').where({ id: 4 }).delete();
  });

  it('should report a statement that overran its deadline as a timeout', async () => {
    await db.raw('CREATE TABLE t (x INTEGER)');
    await db.raw('WITH RECURSIVE s(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM s WHERE x < 400) INSERT INTO t SELECT x FROM s');

    const error = await channelFailure(channel, 'SELECT count(*) AS n FROM t a, t b, t c', 50);

    expect(error.kind).toBe('Timeout');
  });
});
