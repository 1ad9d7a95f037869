/**
 * Cache Monitoring Types
 *
 * Contract every in-process cache must implement to be observed and
 * shrunk by the memory guard.
 *
 * @module types/cache
 */

/**
 * Cache statistics reported to the memory guard and health endpoint
 */
export interface CacheStats {
  /** Estimated memory held by the cache in bytes */
  sizeBytes: number;

  /** Number of stored entries */
  entries: number;

  /** Hit ratio in [0, 1], when the cache tracks lookups */
  hitRate?: number;

  hits?: number;
  misses?: number;
}

/**
 * Cache Monitoring Interface
 *
 * The guard only reads `size()`/`stats()` and commands `clean()`/`clear()`;
 * it never touches cache contents directly.
 */
export interface MonitoredCache {
  /** Estimated memory held by the cache in bytes */
  size(): number;

  /**
   * Shrink the cache.
   *
   * @param targetSizeBytes - Size the cache should end at or below
   */
  clean(targetSizeBytes: number): void;

  /** Drop every entry */
  clear(): void;

  stats(): CacheStats;
}

/**
 * Registration record held by the memory guard
 */
export interface TrackedCache {
  name: string;
  cache: MonitoredCache;
  maxSizeBytes: number;
}
