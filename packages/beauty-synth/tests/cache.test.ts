/**
 * Tests for the dataset cache
 */

import { describe, it, expect } from 'vitest';
import { CacheManager, MemoryCache, NoCache } from '../src/cache/index.js';
import type { CacheStats, CacheStore } from '../src/cache/index.js';
import { CacheError } from '../src/types.js';

describe('MemoryCache', () => {
  it('should return stored values until they expire', async () => {
    let now = 1_000;
    const cache = new MemoryCache({ ttl: 10, now: () => now });
    await cache.set('key', { rows: 3 });

    now += 10_000;
    expect(await cache.get('key')).toEqual({ rows: 3 });

    now += 1;
    expect(await cache.get('key')).toBeNull();
    expect(await cache.size()).toBe(0);
  });

  it('should honour a per-entry ttl', async () => {
    let now = 0;
    const cache = new MemoryCache({ ttl: 100, now: () => now });
    await cache.set('short', 1, 1);

    now = 1_500;
    expect(await cache.get('short')).toBeNull();
  });

  it('should evict the least recently used entry when full', async () => {
    const cache = new MemoryCache({ ttl: 60, maxSize: 2 });
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.get('a');
    await cache.set('c', 3);

    expect(await cache.get('a')).toBe(1);
    expect(await cache.get('b')).toBeNull();
    expect(await cache.get('c')).toBe(3);
  });

  it('should overwrite without evicting', async () => {
    const cache = new MemoryCache({ ttl: 60, maxSize: 2 });
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.set('a', 10);

    expect(await cache.size()).toBe(2);
    expect(await cache.get('a')).toBe(10);
    expect(await cache.get('b')).toBe(2);
  });

  it('should track hits and misses', async () => {
    const cache = new MemoryCache({ ttl: 60 });
    await cache.set('a', 1);
    await cache.get('a');
    await cache.get('a');
    await cache.get('missing');

    const stats = cache.stats();
    expect(stats.hits).toBe(2);
    expect(stats.misses).toBe(1);
    expect(stats.hitRate).toBeCloseTo(2 / 3, 10);
  });

  it('should reset on clear', async () => {
    const cache = new MemoryCache({ ttl: 60 });
    await cache.set('a', 1);
    await cache.get('a');
    await cache.clear();

    expect(cache.stats()).toEqual({ size: 0, maxSize: 100, hits: 0, misses: 0, hitRate: 0 });
  });
});

describe('NoCache', () => {
  it('should never return anything', async () => {
    const cache = new NoCache();
    await cache.set();
    expect(await cache.get()).toBeNull();
    expect(await cache.size()).toBe(0);
  });
});

describe('CacheManager', () => {
  it('should build keys independent of property order', () => {
    const a = CacheManager.generateKey('dataset', { days: 7, brands: ['Radiance'] });
    const b = CacheManager.generateKey('dataset', { brands: ['Radiance'], days: 7 });

    expect(a).toBe(b);
    expect(a).toBe('dataset:brands:["Radiance"]|days:7');
  });

  it('should pick the store from the strategy', async () => {
    const memory = new CacheManager({ strategy: 'memory', ttl: 60 });
    const none = new CacheManager({ strategy: 'none', ttl: 60 });

    await memory.set('k', 'v');
    await none.set('k', 'v');

    expect(await memory.get('k')).toBe('v');
    expect(await none.get('k')).toBeNull();
  });

  it('should wrap store failures in CacheError', async () => {
    class BrokenStore implements CacheStore {
      async get<T>(): Promise<T | null> {
        throw new Error('disk full');
      }
      async set(): Promise<void> {
        throw new Error('disk full');
      }
      async delete(): Promise<boolean> {
        return false;
      }
      async clear(): Promise<void> {}
      async size(): Promise<number> {
        return 0;
      }
      stats(): CacheStats {
        return { size: 0, maxSize: 0, hits: 0, misses: 0, hitRate: 0 };
      }
    }

    const manager = new CacheManager({ strategy: 'memory', ttl: 60 }, new BrokenStore());

    await expect(manager.get('k')).rejects.toThrow(CacheError);
    await expect(manager.set('k', 1)).rejects.toThrow('Failed to cache dataset');
  });
});
