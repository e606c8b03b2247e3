import { describe, it, expect } from 'vitest';
import { QueryLog, type QueryLogEntry } from '../../src/services/query-log.js';

function entry(question: string): QueryLogEntry {
  return {
    timestamp: '2026-01-01T00:00:00.000Z',
    user_id: 'u1',
    role: 'analyst',
    question,
    sql: null,
    status: 'rejected',
    latency_ms: 1.5,
    rows_returned: 0,
    cache_hit: false,
    reject_reason: 'TemplateUnmatched',
  };
}

describe('QueryLog', () => {
  it('should return recent entries newest first', () => {
    const log = new QueryLog(10);
    log.record(entry('one'));
    log.record(entry('two'));
    log.record(entry('three'));

    expect(log.recent(2).map((e) => e.question)).toEqual(['three', 'two']);
  });

  it('should drop the oldest entries beyond capacity', () => {
    const log = new QueryLog(2);
    log.record(entry('one'));
    log.record(entry('two'));
    log.record(entry('three'));

    expect(log.size).toBe(2);
    expect(log.recent(10).map((e) => e.question)).toEqual(['three', 'two']);
  });

  it('should clear', () => {
    const log = new QueryLog(2);
    log.record(entry('one'));
    log.clear();

    expect(log.size).toBe(0);
  });
});
