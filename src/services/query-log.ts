/**
 * Bounded in-memory audit trail of answered and rejected questions.
 */

import type { RejectReason } from '../types/models.js';

export type QueryLogStatus = 'ok' | 'rejected';

export interface QueryLogEntry {
  timestamp: string;
  user_id: string;
  role: string;
  question: string;
  sql: string | null;
  status: QueryLogStatus;
  latency_ms: number;
  rows_returned: number;
  cache_hit: boolean;
  reject_reason: RejectReason | null;
}

export class QueryLog {
  private entries: QueryLogEntry[] = [];

  constructor(private readonly maxEntries: number) {}

  record(entry: QueryLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
  }

  /**
   * Most recent entries, newest first.
   */
  recent(limit: number): QueryLogEntry[] {
    return this.entries.slice(-limit).reverse();
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
