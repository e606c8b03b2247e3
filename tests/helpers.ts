/**
 * Shared fixtures and in-process fakes for the test suite.
 */

import type { DatabaseChannel, RawResult } from '../src/services/database.js';
import type { GenerationEngine } from '../src/services/candidate/generation.js';
import {
  buildSnapshot,
  type CatalogSnapshot,
  type IntrospectedTable,
  type SchemaIntrospector,
} from '../src/services/schema-catalog.js';

export type TableFixture = Record<string, Record<string, string>>;

export const WAREHOUSE: TableFixture = {
  sales: { id: 'integer', amount: 'numeric', region: 'text', user_id: 'integer' },
  users: { id: 'integer', name: 'text', email: 'text' },
  customers: { id: 'integer', name: 'text' },
};

export function introspected(tables: TableFixture): IntrospectedTable[] {
  return Object.entries(tables).map(([name, columns]) => ({
    name,
    columns: Object.entries(columns).map(([column, dataType]) => ({ name: column, dataType })),
  }));
}

export function snapshotOf(tables: TableFixture, fetchedAt = 0): CatalogSnapshot {
  return buildSnapshot(introspected(tables), fetchedAt);
}

export class FakeIntrospector implements SchemaIntrospector {
  calls = 0;

  constructor(public respond: () => Promise<IntrospectedTable[]>) {}

  introspect(): Promise<IntrospectedTable[]> {
    this.calls++;
    return this.respond();
  }
}

export function fakeIntrospector(tables: TableFixture): FakeIntrospector {
  return new FakeIntrospector(async () => introspected(tables));
}

export class FakeChannel implements DatabaseChannel {
  readonly calls: { sql: string; timeoutMs: number }[] = [];

  constructor(public respond: (sql: string) => Promise<RawResult>) {}

  runReadOnly(sql: string, timeoutMs: number): Promise<RawResult> {
    this.calls.push({ sql, timeoutMs });
    return this.respond(sql);
  }
}

export class FakeEngine implements GenerationEngine {
  readonly calls: { question: string; schema: CatalogSnapshot; signal: AbortSignal }[] = [];

  constructor(public reply: (question: string) => Promise<string>) {}

  generate(question: string, schema: CatalogSnapshot, signal: AbortSignal): Promise<string> {
    this.calls.push({ question, schema, signal });
    return this.reply(question);
  }
}

export function engineReturning(sql: string): FakeEngine {
  return new FakeEngine(async () => sql);
}

/**
 * A promise that never settles.
 */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
