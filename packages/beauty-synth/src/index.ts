/**
 * beauty-synth - synthetic multi-brand beauty business data
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { GenerateOptionsSchema, toValidationError } from './types.js';
import type {
  GenerateOptions,
  GenerationEvents,
  GenerationResult,
  MockDataset,
  ResolvedGenerateOptions
} from './types.js';
import { BeautySynthConfigSchema, DEFAULT_CONFIG } from './config.js';
import type { BeautySynthConfig } from './config.js';
import { CacheManager } from './cache/index.js';
import type { CacheStats } from './cache/index.js';
import { DatasetBuilder, cloneDataset, countRows } from './dataset.js';
import { DEFAULT_CATALOG } from './catalog/index.js';
import type { Catalog } from './catalog/index.js';
import { createRandom } from './random/index.js';
import type { RandomSource } from './random/index.js';
import { formatDay } from './export/index.js';

/**
 * Validate raw options and fill in defaults
 */
export function resolveOptions(options: GenerateOptions): ResolvedGenerateOptions {
  const parsed = GenerateOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'Invalid generation options');
  }
  return parsed.data;
}

/**
 * Generate a dataset synchronously, without caching or events
 */
export function generateMockData(
  options: GenerateOptions,
  random: RandomSource = createRandom(options.seed),
  catalog: Catalog = DEFAULT_CATALOG
): MockDataset {
  return new DatasetBuilder(catalog).build(resolveOptions(options), random);
}

/**
 * Dataset generator with result caching and lifecycle events
 *
 * @example
 * ```typescript
 * const synth = new BeautySynth({ cacheStrategy: 'memory' });
 * synth.on('generation:complete', ({ rowCounts }) => console.log(rowCounts));
 *
 * const { data } = await synth.generate({
 *   startDate: '2024-01-01',
 *   days: 30,
 *   brands: ['Radiance', 'GlowUp'],
 *   seed: 7
 * });
 * ```
 */
export class BeautySynth extends EventEmitter {
  private config: BeautySynthConfig;
  private cache: CacheManager;
  private builder: DatasetBuilder;

  constructor(config: Partial<BeautySynthConfig> = {}) {
    super();
    this.config = this.parseConfig({ ...DEFAULT_CONFIG, ...config });
    this.cache = this.createCache();
    this.builder = new DatasetBuilder(this.config.catalog ?? DEFAULT_CATALOG);
  }

  /**
   * Generate all four tables. Identical inputs are served from the cache
   * unless a random source is passed in. Every failure is announced with
   * `generation:error` before it is rethrown.
   */
  async generate(options: GenerateOptions, random?: RandomSource): Promise<GenerationResult> {
    try {
      return await this.run(options, random);
    } catch (error) {
      this.emitEvent('generation:error', { error });
      throw error;
    }
  }

  private async run(options: GenerateOptions, random?: RandomSource): Promise<GenerationResult> {
    const startTime = Date.now();
    const resolved = resolveOptions(options);

    const cacheKey = CacheManager.generateKey('dataset', {
      startDate: formatDay(resolved.startDate),
      days: resolved.days,
      brands: resolved.brands,
      seed: resolved.seed ?? null
    });

    if (!random) {
      const cached = await this.cache.get<GenerationResult>(cacheKey);
      if (cached) {
        this.emitEvent('generation:cached', { key: cacheKey });
        return copyResult(cached, true);
      }
    }

    this.emitEvent('generation:start', { options: resolved });

    const data = this.builder.build(resolved, random ?? createRandom(resolved.seed));
    const rowCounts = countRows(data);
    const result: GenerationResult = {
      data,
      metadata: {
        rowCounts,
        brands: resolved.brands,
        startDate: resolved.startDate,
        days: resolved.days,
        ...(resolved.seed !== undefined && { seed: resolved.seed }),
        generatedAt: new Date(),
        cached: false,
        duration: Date.now() - startTime
      }
    };

    if (!random) {
      // The cache keeps its own copy; callers may mutate what they get
      await this.cache.set(cacheKey, copyResult(result, false), this.config.cacheTTL);
    }

    this.emitEvent('generation:complete', { rowCounts, duration: result.metadata.duration });
    return result;
  }

  /**
   * Replace configuration; the cache starts empty afterwards
   */
  configure(config: Partial<BeautySynthConfig>): void {
    this.config = this.parseConfig({ ...this.config, ...config });
    this.cache = this.createCache();
    this.builder = new DatasetBuilder(this.config.catalog ?? DEFAULT_CATALOG);
  }

  getConfig(): BeautySynthConfig {
    return { ...this.config };
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
  }

  getCacheStats(): CacheStats {
    return this.cache.stats();
  }

  private emitEvent<K extends keyof GenerationEvents>(event: K, payload: GenerationEvents[K]): void {
    this.emit(event, payload);
  }

  private parseConfig(config: Partial<BeautySynthConfig>): BeautySynthConfig {
    const parsed = BeautySynthConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw toValidationError(parsed.error, 'Invalid configuration');
    }
    return parsed.data;
  }

  private createCache(): CacheManager {
    return new CacheManager({
      strategy: this.config.cacheStrategy,
      ttl: this.config.cacheTTL,
      maxSize: this.config.maxCacheEntries
    });
  }
}

function copyResult(result: GenerationResult, cached: boolean): GenerationResult {
  return {
    data: cloneDataset(result.data),
    metadata: {
      ...result.metadata,
      rowCounts: { ...result.metadata.rowCounts },
      brands: [...result.metadata.brands],
      startDate: new Date(result.metadata.startDate.getTime()),
      generatedAt: new Date(result.metadata.generatedAt.getTime()),
      cached
    }
  };
}

/**
 * Create a new BeautySynth instance
 */
export function createSynth(config?: Partial<BeautySynthConfig>): BeautySynth {
  return new BeautySynth(config);
}

// Export types and utilities
export * from './types.js';
export * from './config.js';
export * from './catalog/index.js';
export * from './random/index.js';
export * from './generators/index.js';
export * from './cache/index.js';
export * from './export/index.js';
export { DatasetBuilder, cloneDataset, countRows } from './dataset.js';

export default BeautySynth;
