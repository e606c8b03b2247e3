import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app.js';
import { AccessPolicy } from '../../src/services/access-policy.js';
import { CandidateProducer, TEMPLATE_UNMATCHED_MESSAGE } from '../../src/services/candidate/producer.js';
import { TemplateProducer } from '../../src/services/candidate/template.js';
import { BoundedExecutor } from '../../src/services/executor.js';
import { SummaryExplainer } from '../../src/services/explainer.js';
import { EXECUTION_TIMEOUT_MESSAGE, QueryPipeline } from '../../src/services/pipeline.js';
import { QueryLog } from '../../src/services/query-log.js';
import { ResultCache } from '../../src/services/result-cache.js';
import { SchemaCatalog } from '../../src/services/schema-catalog.js';
import { DatabaseError } from '../../src/types/errors.js';
import { FakeChannel, FakeIntrospector, WAREHOUSE, fakeIntrospector } from '../helpers.js';

const INFO = {
  name: 'querywarden',
  version: '0.1.0',
  databaseClient: 'better-sqlite3',
  generationMode: 'template',
};

const ANALYST = { 'x-user-id': 'u1', 'x-user-role': 'analyst' };
const ADMIN = { 'x-user-id': 'u2', 'x-user-role': 'admin' };

function services(channel: FakeChannel, introspector: FakeIntrospector = fakeIntrospector(WAREHOUSE)) {
  const catalog = new SchemaCatalog(introspector, { ttlSeconds: 60 });
  const policy = new AccessPolicy({ roles: { analyst: ['sales'], admin: '*' }, admins: ['admin'] });
  const queryLog = new QueryLog(100);
  const pipeline = new QueryPipeline(
    {
      catalog,
      policy,
      producer: new CandidateProducer(new TemplateProducer(), null, { mode: 'template', generationTimeoutMs: 1000 }),
      executor: new BoundedExecutor(channel, { statementTimeoutMs: 1000, maxRows: 1000 }),
      cache: new ResultCache({ maxEntries: 100, ttlSeconds: 60 }),
      explainer: new SummaryExplainer(),
      queryLog,
    },
    { maxLimit: 1000, defaultLimit: 100, maxQuestionLength: 200 }
  );
  return { catalog, policy, queryLog, pipeline };
}

describe('HTTP API', () => {
  let app: FastifyInstance;
  let channel: FakeChannel;

  beforeEach(async () => {
    channel = new FakeChannel(async () => ({ columns: ['count'], rows: [{ count: 7 }] }));
    app = await buildApp(services(channel), INFO);
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /query', () => {
    it('should require identity headers', async () => {
      const response = await app.inject({ method: 'POST', url: '/query', payload: { question: 'how many sales' } });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        error: 'Unauthorized',
        message: 'Missing or invalid x-user-id / x-user-role headers',
      });
    });

    it('should answer a question', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/query',
        headers: ANALYST,
        payload: { question: 'how many sales' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'ok',
        sql: 'SELECT COUNT(*) AS count FROM sales LIMIT 100',
        columns: ['count'],
        rows: [{ count: 7 }],
        row_count: 1,
        cache_hit: false,
        source: 'template',
        explanation: 'Retrieved 1 record(s) with columns: count.',
      });
    });

    it('should answer 422 when no template matches', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/query',
        headers: ADMIN,
        payload: { question: 'what is the weather' },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toMatchObject({ reject_reason: 'TemplateUnmatched', message: TEMPLATE_UNMATCHED_MESSAGE });
    });

    it('should answer 400 for an empty question', async () => {
      const response = await app.inject({ method: 'POST', url: '/query', headers: ANALYST, payload: { question: ' ' } });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ kind: 'ValidationRejected', reject_reason: 'EmptyQuestion' });
    });

    it('should answer 400 for a body without a question', async () => {
      const response = await app.inject({ method: 'POST', url: '/query', headers: ANALYST, payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'BadRequest' });
    });

    it('should answer 504 on a statement timeout', async () => {
      channel.respond = async () => {
        throw new DatabaseError('Timeout', 'canceling statement due to statement timeout');
      };

      const response = await app.inject({
        method: 'POST',
        url: '/query',
        headers: ANALYST,
        payload: { question: 'how many sales' },
      });

      expect(response.statusCode).toBe(504);
      expect(response.json()).toMatchObject({ kind: 'ExecutionTimeout', message: EXECUTION_TIMEOUT_MESSAGE });
    });

    it('should answer 500 on an execution failure', async () => {
      channel.respond = async () => {
        throw new DatabaseError('ConnectionError', 'connect ECONNREFUSED');
      };

      const response = await app.inject({
        method: 'POST',
        url: '/query',
        headers: ANALYST,
        payload: { question: 'how many sales' },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toMatchObject({ kind: 'ExecutionFailure', reject_reason: 'ExecutionFailure' });
    });
  });

  describe('cache endpoints', () => {
    it('should report cache statistics', async () => {
      await app.inject({ method: 'POST', url: '/query', headers: ANALYST, payload: { question: 'how many sales' } });
      await app.inject({ method: 'POST', url: '/query', headers: ANALYST, payload: { question: 'how many sales' } });

      const response = await app.inject({ method: 'GET', url: '/cache/stats', headers: ANALYST });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        entry_count: 1,
        max_entries: 100,
        ttl_seconds: 60,
        hit_count: 1,
        miss_count: 1,
        eviction_count: 0,
      });
    });

    it('should refuse to clear the cache for a non-admin role', async () => {
      const response = await app.inject({ method: 'POST', url: '/cache/clear', headers: ANALYST });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        error: 'Forbidden',
        message: "Role 'analyst' may not clear the result cache",
      });
    });

    it('should clear the cache for an admin role', async () => {
      await app.inject({ method: 'POST', url: '/query', headers: ANALYST, payload: { question: 'how many sales' } });

      const response = await app.inject({ method: 'POST', url: '/cache/clear', headers: ADMIN });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ cleared: 1 });
    });
  });

  describe('GET /logs', () => {
    it('should return recent questions to admins', async () => {
      await app.inject({ method: 'POST', url: '/query', headers: ANALYST, payload: { question: 'how many sales' } });

      const response = await app.inject({ method: 'GET', url: '/logs?limit=5', headers: ADMIN });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.count).toBe(1);
      expect(body.logs[0]).toMatchObject({
        user_id: 'u1',
        role: 'analyst',
        question: 'how many sales',
        status: 'ok',
        rows_returned: 1,
      });
    });

    it('should reject an out-of-range limit', async () => {
      const response = await app.inject({ method: 'GET', url: '/logs?limit=0', headers: ADMIN });

      expect(response.statusCode).toBe(400);
    });

    it('should hide the log from other roles', async () => {
      const response = await app.inject({ method: 'GET', url: '/logs', headers: ANALYST });

      expect(response.statusCode).toBe(403);
    });
  });

  describe('GET /health', () => {
    it('should report the catalog size', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'ok',
        database: { client: 'better-sqlite3', tables: 3 },
        generation_mode: 'template',
      });
    });

    it('should answer 503 when the catalog cannot be built', async () => {
      const failing = new FakeIntrospector(async () => {
        throw new Error('connection refused');
      });
      const down = await buildApp(services(channel, failing), INFO);

      const response = await down.inject({ method: 'GET', url: '/health' });
      await down.close();

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: 'unavailable' });
    });
  });

  it('should describe the service at the root', async () => {
    const response = await app.inject({ method: 'GET', url: '/' });

    expect(response.json()).toMatchObject({ name: 'querywarden', version: '0.1.0' });
  });
});
