/**
 * Per-identity result cache.
 *
 * Map insertion order is recency order: a hit deletes and re-inserts its
 * key. Entries go in and come out as structured clones, so callers never
 * share a reference with the cache.
 */

import { createHash } from 'crypto';
import type { CacheStats, Identity } from '../types/models.js';
import type { JsonObject } from '../types/utils.js';
import { logger } from '../utils/logger.js';

export interface CachedAnswer {
  sql: string;
  columns: string[];
  rows: JsonObject[];
  explanation?: string;
}

interface CacheEntry extends CachedAnswer {
  createdAt: number;
}

export interface ResultCacheOptions {
  maxEntries: number;
  ttlSeconds: number;
  now?: () => number;
}

/**
 * Lowercase, trim and collapse whitespace.
 */
export function normalizeQuestion(question: string): string {
  return question.toLowerCase().trim().replace(/\s+/g, ' ');
}

/**
 * SHA-256 over user id, role and normalized question.
 */
export function cacheKey(identity: Identity, question: string): string {
  return createHash('sha256')
    .update(JSON.stringify([identity.userId, identity.role, normalizeQuestion(question)]))
    .digest('hex');
}

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ResultCacheOptions) {
    this.maxEntries = options.maxEntries;
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fresh entry for this identity and question, or undefined.
   * Expired entries are dropped without touching recency.
   */
  get(identity: Identity, question: string): CachedAnswer | undefined {
    const key = cacheKey(identity, question);
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.now() - entry.createdAt >= this.ttlMs) {
      this.remove(key);
      this.misses++;
      return undefined;
    }

    // LRU promotion
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    const { createdAt: _createdAt, ...answer } = structuredClone(entry);
    return answer;
  }

  /**
   * Store an answer, evicting the least recently used entry when full.
   */
  put(identity: Identity, question: string, answer: CachedAnswer): void {
    const key = cacheKey(identity, question);
    const entry: CacheEntry = { ...structuredClone(answer), createdAt: this.now() };

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else {
      while (this.entries.size >= this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.remove(oldest.value);
      }
    }

    this.entries.set(key, entry);
  }

  stats(): CacheStats {
    return {
      entry_count: this.entries.size,
      max_entries: this.maxEntries,
      ttl_seconds: this.ttlMs / 1000,
      hit_count: this.hits,
      miss_count: this.misses,
      eviction_count: this.evictions,
    };
  }

  /**
   * Drop every entry. Counters are kept.
   */
  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    logger.info(`Result cache cleared (${count} entries)`);
    return count;
  }

  private remove(key: string): void {
    if (this.entries.delete(key)) {
      this.evictions++;
    }
  }
}
