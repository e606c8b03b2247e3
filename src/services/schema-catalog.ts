/**
 * In-memory schema catalog for querywarden.
 *
 * Holds one immutable snapshot of table/column metadata. A refresh builds a
 * complete new snapshot and swaps the reference, so readers never observe a
 * half-built catalog.
 */

import { logger } from '../utils/logger.js';
import { CatalogUnavailableError, describeError } from '../types/errors.js';

/**
 * One table as reported by the database.
 */
export interface IntrospectedTable {
  name: string;
  columns: { name: string; dataType: string }[];
}

/**
 * Source of live table metadata (see services/database.ts).
 */
export interface SchemaIntrospector {
  introspect(): Promise<IntrospectedTable[]>;
}

/**
 * Catalog entry: lowercased table name and its column → data type map.
 */
export interface TableEntry {
  readonly name: string;
  readonly columns: Readonly<Record<string, string>>;
}

/**
 * Immutable view of the catalog at one point in time.
 * Also used for role-filtered views handed to producers.
 */
export interface CatalogSnapshot {
  readonly tables: ReadonlyMap<string, TableEntry>;
  readonly fetchedAt: number;
}

export interface SchemaCatalogOptions {
  ttlSeconds: number;
  now?: () => number;
}

/**
 * Build a snapshot from introspected tables.
 * Names are lowercased; the first occurrence of a duplicate wins.
 */
export function buildSnapshot(tables: IntrospectedTable[], fetchedAt: number): CatalogSnapshot {
  const entries = new Map<string, TableEntry>();

  for (const table of tables) {
    const name = table.name.toLowerCase();
    if (entries.has(name)) {
      logger.warn(`Skipping duplicate table name in catalog: ${table.name}`);
      continue;
    }
    const columns: Record<string, string> = {};
    for (const column of table.columns) {
      columns[column.name] = column.dataType;
    }
    entries.set(name, Object.freeze({ name, columns: Object.freeze(columns) }));
  }

  return Object.freeze({ tables: entries, fetchedAt });
}

/**
 * Format a (possibly filtered) catalog for LLM prompts.
 *
 * @example
 * ```
 * sales(id integer, amount numeric, region text)
 * users(id integer, name text)
 * ```
 */
export function formatSchemaForPrompt(snapshot: CatalogSnapshot): string {
  const lines: string[] = [];
  const names = Array.from(snapshot.tables.keys()).sort();

  for (const name of names) {
    const entry = snapshot.tables.get(name);
    if (!entry) continue;
    const columns = Object.entries(entry.columns)
      .map(([column, type]) => `${column} ${type}`)
      .join(', ');
    lines.push(`${name}(${columns})`);
  }

  return lines.join('\n');
}

/**
 * TTL-refreshed catalog. Concurrent callers that find the snapshot stale share
 * a single in-flight refresh.
 */
export class SchemaCatalog {
  private snapshot: CatalogSnapshot | null = null;
  private refreshing: Promise<CatalogSnapshot> | null = null;
  /** After a failed refresh, the previous snapshot is served until this time. */
  private retryAfter = 0;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly introspector: SchemaIntrospector,
    options: SchemaCatalogOptions
  ) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Current snapshot, refreshed first if missing or older than the TTL.
   *
   * @throws CatalogUnavailableError if no snapshot was ever built and introspection fails
   */
  async getSnapshot(): Promise<CatalogSnapshot> {
    const current = this.snapshot;
    const now = this.now();
    if (current && (now - current.fetchedAt < this.ttlMs || now < this.retryAfter)) {
      return current;
    }
    return this.refresh();
  }

  /**
   * Rebuild the snapshot now.
   */
  refresh(): Promise<CatalogSnapshot> {
    if (!this.refreshing) {
      this.refreshing = this.load().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async load(): Promise<CatalogSnapshot> {
    let tables: IntrospectedTable[];
    try {
      tables = await this.introspector.introspect();
    } catch (error) {
      const previous = this.snapshot;
      if (previous) {
        this.retryAfter = this.now() + this.ttlMs;
        logger.warn(`Schema refresh failed, keeping previous snapshot: ${describeError(error)}`);
        return previous;
      }
      throw new CatalogUnavailableError(`Schema introspection failed: ${describeError(error)}`);
    }

    const next = buildSnapshot(tables, this.now());
    this.snapshot = next;
    logger.info(`Cached schema for ${next.tables.size} tables`);
    return next;
  }
}
