/**
 * Memory Cache
 *
 * Reference implementation of the Cache Monitoring Interface. Entries are
 * kept in recency order (a `Map` re-inserted on access), so `clean()`
 * evicts least-recently-used entries first.
 */

import { serialize } from 'node:v8';
import type { CacheStats, MonitoredCache } from '../types/cache.js';

export interface MemoryCacheOptions<V> {
  /**
   * Byte estimate for one value. Defaults to the length of its V8
   * serialization.
   */
  sizeOf?: (value: V) => number;
}

interface CacheEntry<V> {
  value: V;
  bytes: number;
}

/**
 * Estimate the bytes held by a value.
 *
 * Values V8 cannot serialize (functions, symbols, class instances with
 * native handles) fall back to the length of their string form.
 */
export function estimateBytes(value: unknown): number {
  try {
    return serialize(value).byteLength;
  } catch {
    return Buffer.byteLength(String(value));
  }
}

export class MemoryCache<V = unknown> implements MonitoredCache {
  private entries = new Map<string, CacheEntry<V>>();
  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private readonly sizeOf: (value: V) => number;

  constructor(options: MemoryCacheOptions<V> = {}) {
    this.sizeOf = options.sizeOf ?? estimateBytes;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: V): void {
    this.delete(key);
    const bytes = Buffer.byteLength(key) + this.sizeOf(value);
    this.entries.set(key, { value, bytes });
    this.totalBytes += bytes;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.entries.delete(key);
    this.totalBytes -= entry.bytes;
    return true;
  }

  /** Number of entries */
  get length(): number {
    return this.entries.size;
  }

  size(): number {
    return this.totalBytes;
  }

  clean(targetSizeBytes: number): void {
    for (const key of this.entries.keys()) {
      if (this.totalBytes <= targetSizeBytes) {
        return;
      }
      this.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
    this.totalBytes = 0;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;

    return {
      sizeBytes: this.totalBytes,
      entries: this.entries.size,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
