/**
 * Cache Monitoring Interface guards
 *
 * Runtime checks used at cache registration. Bare collections (`Map`,
 * `Set`, arrays, plain objects) cannot be observed or shrunk through the
 * interface and are rejected with a message naming the adapter to use.
 */

import type { MonitoredCache } from '../types/cache.js';

/**
 * True when `value` implements size/clean/clear/stats as methods
 */
export function isMonitoredCache(value: unknown): value is MonitoredCache {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'size' in value &&
    typeof value.size === 'function' &&
    'clean' in value &&
    typeof value.clean === 'function' &&
    'clear' in value &&
    typeof value.clear === 'function' &&
    'stats' in value &&
    typeof value.stats === 'function'
  );
}

/**
 * Human readable name of a value's type, for registration errors
 */
export function describeCacheType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'Array';
  }
  if (value instanceof Map) {
    return 'Map';
  }
  if (value instanceof Set) {
    return 'Set';
  }
  if (value instanceof WeakMap) {
    return 'WeakMap';
  }
  if (value instanceof WeakSet) {
    return 'WeakSet';
  }
  if (typeof value === 'object') {
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype === Object.prototype || prototype === null) {
      return 'plain object';
    }
    const name = value.constructor?.name;
    return name ? name : 'object';
  }
  return typeof value;
}

/**
 * Remediation hint for an uncooperative cache type
 */
export function suggestCacheAdapter(typeName: string): string {
  switch (typeName) {
    case 'Map':
    case 'Set':
      return 'wrap it with CollectionCacheAdapter';
    case 'Array':
    case 'plain object':
      return 'store entries in a MemoryCache instead';
    case 'WeakMap':
    case 'WeakSet':
      return 'weak collections are reclaimed by the garbage collector and need no registration';
    default:
      return 'implement size(), clean(), clear() and stats()';
  }
}
