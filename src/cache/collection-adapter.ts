/**
 * Collection Cache Adapter
 *
 * Makes third-party containers (`Map`, `Set`, lru-cache style objects)
 * observable by the memory guard. Keys are evicted in the container's
 * iteration order, which is insertion order for `Map` and `Set`.
 */

import type { CacheStats, MonitoredCache } from '../types/cache.js';

/**
 * Minimal surface the adapter needs from a container
 */
export interface EvictableCollection<K> {
  readonly size: number;
  keys(): Iterable<K>;
  delete(key: K): boolean;
  clear(): void;
}

export interface CollectionCacheAdapterOptions<C> {
  /** Byte estimate per entry when no `measure` is given (default 1 KiB) */
  averageEntryBytes?: number;

  /** Exact byte measurement of the whole container */
  measure?: (collection: C) => number;
}

const DEFAULT_AVERAGE_ENTRY_BYTES = 1024;

export class CollectionCacheAdapter<K, C extends EvictableCollection<K> = EvictableCollection<K>>
  implements MonitoredCache
{
  private readonly averageEntryBytes: number;
  private readonly measure?: (collection: C) => number;

  constructor(
    private readonly collection: C,
    options: CollectionCacheAdapterOptions<C> = {}
  ) {
    this.averageEntryBytes = options.averageEntryBytes ?? DEFAULT_AVERAGE_ENTRY_BYTES;
    this.measure = options.measure;
  }

  /** The wrapped container */
  get target(): C {
    return this.collection;
  }

  size(): number {
    return this.measure
      ? this.measure(this.collection)
      : this.collection.size * this.averageEntryBytes;
  }

  clean(targetSizeBytes: number): void {
    // Snapshot keys first: deleting while iterating a live view is not
    // safe for every container.
    const keys = Array.from(this.collection.keys());
    for (const key of keys) {
      if (this.size() <= targetSizeBytes) {
        return;
      }
      this.collection.delete(key);
    }
  }

  clear(): void {
    this.collection.clear();
  }

  stats(): CacheStats {
    return {
      sizeBytes: this.size(),
      entries: this.collection.size,
    };
  }
}
