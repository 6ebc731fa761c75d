/**
 * Result cache so repeated requests with identical inputs skip regeneration
 */

import { CacheError } from '../types.js';
import type { CacheStrategy } from '../types.js';

export interface CacheEntry<T = unknown> {
  value: T;
  storedAt: number;
  /** Lifetime in seconds */
  ttl: number;
  hits: number;
}

export interface CacheOptions {
  strategy: CacheStrategy;
  ttl: number;
  maxSize?: number;
  now?: () => number;
}

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface CacheStore {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttl?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  size(): Promise<number>;
  stats(): CacheStats;
}

/**
 * In-memory store with TTL expiry and least-recently-used eviction
 */
export class MemoryCache implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxSize: number;
  private readonly defaultTTL: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: Omit<CacheOptions, 'strategy'>) {
    this.maxSize = options.maxSize ?? 100;
    this.defaultTTL = options.ttl;
    this.now = options.now ?? Date.now;
  }

  async get<T>(key: string): Promise<T | null> {
    const entry = this.entries.get(key);

    if (!entry || this.isExpired(entry)) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return null;
    }

    // Re-insert so Map order tracks recency
    entry.hits++;
    this.hits++;
    this.entries.delete(key);
    this.entries.set(key, entry);

    // Values are stored through set<T>() under the same key
    return entry.value as T;
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<void> {
    if (!this.entries.has(key)) {
      while (this.entries.size >= this.maxSize) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, { value, storedAt: this.now(), ttl: ttl ?? this.defaultTTL, hits: 0 });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.storedAt > entry.ttl * 1000;
  }
}

/**
 * Store used when caching is switched off
 */
export class NoCache implements CacheStore {
  async get<T>(): Promise<T | null> {
    return null;
  }

  async set(): Promise<void> {}

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

function createStore(options: CacheOptions): CacheStore {
  switch (options.strategy) {
    case 'memory':
      return new MemoryCache(options);
    case 'none':
      return new NoCache();
  }
}

export class CacheManager {
  private readonly store: CacheStore;

  constructor(options: CacheOptions, store?: CacheStore) {
    this.store = store ?? createStore(options);
  }

  async get<T>(key: string): Promise<T | null> {
    try {
      return await this.store.get<T>(key);
    } catch (error) {
      throw new CacheError('Failed to read cached dataset', { key, error });
    }
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<void> {
    try {
      await this.store.set(key, value, ttl);
    } catch (error) {
      throw new CacheError('Failed to cache dataset', { key, error });
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      return await this.store.delete(key);
    } catch (error) {
      throw new CacheError('Failed to evict cached dataset', { key, error });
    }
  }

  async clear(): Promise<void> {
    try {
      await this.store.clear();
    } catch (error) {
      throw new CacheError('Failed to clear dataset cache', { error });
    }
  }

  async size(): Promise<number> {
    return this.store.size();
  }

  stats(): CacheStats {
    return this.store.stats();
  }

  /**
   * Stable key from parameters, independent of property order
   */
  static generateKey(prefix: string, params: Record<string, unknown>): string {
    const sorted = Object.keys(params)
      .sort()
      .map(key => `${key}:${JSON.stringify(params[key])}`)
      .join('|');
    return `${prefix}:${sorted}`;
  }
}
