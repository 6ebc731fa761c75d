/**
 * Synth configuration, from code or from the environment
 */

import { z } from 'zod';
import { CacheStrategySchema, toValidationError } from './types.js';
import type { CacheStrategy } from './types.js';
import { CatalogSchema } from './catalog/index.js';
import type { Catalog } from './catalog/index.js';

export interface BeautySynthConfig {
  cacheStrategy: CacheStrategy;
  /** Seconds a cached dataset stays valid */
  cacheTTL: number;
  maxCacheEntries: number;
  catalog?: Catalog;
}

export const BeautySynthConfigSchema = z.object({
  cacheStrategy: CacheStrategySchema.default('memory'),
  cacheTTL: z.number().positive().default(3600),
  maxCacheEntries: z.number().int().positive().default(20),
  catalog: CatalogSchema.optional()
});

export const DEFAULT_CONFIG: BeautySynthConfig = {
  cacheStrategy: 'memory',
  cacheTTL: 3600,
  maxCacheEntries: 20
};

/**
 * Values read from `BEAUTY_SYNTH_*` variables; absent variables stay undefined
 */
export interface EnvSettings {
  config: Partial<BeautySynthConfig>;
  seed?: string;
  days?: number;
  brands?: string[];
}

const optionalText = z
  .string()
  .trim()
  .transform(value => (value === '' ? undefined : value))
  .optional();

const EnvSchema = z.object({
  BEAUTY_SYNTH_CACHE: optionalText.pipe(CacheStrategySchema.optional()),
  BEAUTY_SYNTH_CACHE_TTL: optionalText.pipe(z.coerce.number().positive().optional()),
  BEAUTY_SYNTH_SEED: optionalText,
  BEAUTY_SYNTH_DAYS: optionalText.pipe(z.coerce.number().int().nonnegative().optional()),
  BEAUTY_SYNTH_BRANDS: optionalText.transform(value =>
    value
      ?.split(',')
      .map(brand => brand.trim())
      .filter(brand => brand.length > 0)
  )
});

export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'Invalid environment');
  }

  const vars = parsed.data;
  const config: Partial<BeautySynthConfig> = {};
  if (vars.BEAUTY_SYNTH_CACHE) config.cacheStrategy = vars.BEAUTY_SYNTH_CACHE;
  if (vars.BEAUTY_SYNTH_CACHE_TTL !== undefined) config.cacheTTL = vars.BEAUTY_SYNTH_CACHE_TTL;

  return {
    config,
    seed: vars.BEAUTY_SYNTH_SEED,
    days: vars.BEAUTY_SYNTH_DAYS,
    brands: vars.BEAUTY_SYNTH_BRANDS
  };
}
