import { describe, it, expect } from 'vitest';
import { MemoryCache, estimateBytes } from '../../../src/cache/memory-cache.js';

const byLength = (value: string): number => value.length;

describe('MemoryCache', () => {
  it('tracks bytes for keys and values', () => {
    const cache = new MemoryCache<string>({ sizeOf: byLength });

    cache.set('a', 'xxxx');
    cache.set('bb', 'yy');

    // 1 + 4, then 2 + 2
    expect(cache.size()).toBe(9);
    expect(cache.length).toBe(2);
  });

  it('replaces an existing entry without double counting', () => {
    const cache = new MemoryCache<string>({ sizeOf: byLength });

    cache.set('k', 'x'.repeat(10));
    cache.set('k', 'x'.repeat(3));

    expect(cache.size()).toBe(4);
    expect(cache.get('k')).toBe('xxx');
  });

  it('counts hits and misses', () => {
    const cache = new MemoryCache<string>({ sizeOf: byLength });
    cache.set('a', 'value');

    expect(cache.get('a')).toBe('value');
    expect(cache.get('missing')).toBeUndefined();

    expect(cache.stats()).toEqual({
      sizeBytes: 6,
      entries: 1,
      hitRate: 0.5,
      hits: 1,
      misses: 1,
    });
  });

  it('reports a zero hit rate before any lookup', () => {
    expect(new MemoryCache().stats().hitRate).toBe(0);
  });

  it('evicts least recently used entries first when cleaned', () => {
    const cache = new MemoryCache<string>({ sizeOf: byLength });
    cache.set('a', 'x'.repeat(100));
    cache.set('b', 'x'.repeat(100));
    cache.set('c', 'x'.repeat(100));

    // Touch "a" so "b" becomes the oldest
    cache.get('a');
    cache.clean(202);

    expect(cache.has('b')).toBe(false);
    expect(cache.has('a')).toBe(true);
    expect(cache.has('c')).toBe(true);
    expect(cache.size()).toBe(202);
  });

  it('empties the cache when cleaned to zero', () => {
    const cache = new MemoryCache<string>({ sizeOf: byLength });
    cache.set('a', 'x');
    cache.set('b', 'y');

    cache.clean(0);

    expect(cache.size()).toBe(0);
    expect(cache.length).toBe(0);
  });

  it('delete and clear keep the byte total in sync', () => {
    const cache = new MemoryCache<string>({ sizeOf: byLength });
    cache.set('a', 'xx');
    cache.set('b', 'yyy');

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    expect(cache.size()).toBe(4);

    cache.clear();
    expect(cache.size()).toBe(0);
    expect(cache.get('b')).toBeUndefined();
  });

  it('estimates bytes with the default serializer', () => {
    const cache = new MemoryCache<{ items: number[] }>();
    cache.set('list', { items: [1, 2, 3] });

    expect(cache.size()).toBe(4 + estimateBytes({ items: [1, 2, 3] }));
    expect(cache.size()).toBeGreaterThan(4);
  });
});

describe('estimateBytes', () => {
  it('grows with the serialized payload', () => {
    expect(estimateBytes('x'.repeat(1000))).toBeGreaterThan(estimateBytes('x'));
  });

  it('falls back to the string form for values V8 cannot serialize', () => {
    const fn = (): number => 1;

    expect(estimateBytes(fn)).toBe(Buffer.byteLength(String(fn)));
  });
});
