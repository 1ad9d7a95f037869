/**
 * Cache Monitoring Module
 */

export { MemoryCache, estimateBytes, type MemoryCacheOptions } from './memory-cache.js';
export {
  CollectionCacheAdapter,
  type CollectionCacheAdapterOptions,
  type EvictableCollection,
} from './collection-adapter.js';
export { isMonitoredCache, describeCacheType, suggestCacheAdapter } from './monitored-cache.js';
