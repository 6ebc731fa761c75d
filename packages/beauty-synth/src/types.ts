/**
 * Core types and interfaces for beauty-synth
 */

import { z } from 'zod';

// Enumerations
export const SalesChannelSchema = z.enum(['Online', 'In-store', 'Wholesale']);
export type SalesChannel = z.infer<typeof SalesChannelSchema>;

export const OfferSchema = z.enum(['None', '10% Off', 'Buy 1 Get 1', 'Free Gift']);
export type Offer = z.infer<typeof OfferSchema>;

export const MarketingChannelSchema = z.enum(['Organic', 'Paid', 'Social', 'Email']);
export type MarketingChannel = z.infer<typeof MarketingChannelSchema>;

export const SocialPlatformSchema = z.enum(['Instagram', 'Facebook', 'TikTok', 'YouTube']);
export type SocialPlatform = z.infer<typeof SocialPlatformSchema>;

export const SentimentSchema = z.enum(['Positive', 'Neutral', 'Negative']);
export type Sentiment = z.infer<typeof SentimentSchema>;

export const CacheStrategySchema = z.enum(['none', 'memory']);
export type CacheStrategy = z.infer<typeof CacheStrategySchema>;

export type TableName = 'sales' | 'marketing' | 'social' | 'reviews';

// Generated rows
export interface SalesRecord {
  readonly brand: string;
  readonly date: Date;
  readonly category: string;
  readonly product: string;
  readonly channel: SalesChannel;
  readonly offer: Offer;
  readonly campaign: string;
  readonly qty: number;
  readonly unitPrice: number;
  readonly revenue: number;
}

export interface MarketingRecord {
  readonly brand: string;
  readonly date: Date;
  readonly channel: MarketingChannel;
  readonly campaign: string;
  readonly traffic: number;
  readonly ctr: number;
  /** Cost per click; only paid traffic carries one */
  readonly cpc: number | null;
}

export interface SocialRecord {
  readonly brand: string;
  readonly date: Date;
  readonly platform: SocialPlatform;
  readonly engagementRate: number;
  readonly followers: number;
}

export interface ReviewRecord {
  readonly brand: string;
  readonly date: Date;
  readonly sentiment: Sentiment;
  readonly rating: number;
}

export interface MockDataset {
  readonly sales: readonly SalesRecord[];
  readonly marketing: readonly MarketingRecord[];
  readonly social: readonly SocialRecord[];
  readonly reviews: readonly ReviewRecord[];
  readonly campaigns: readonly string[];
}

/**
 * Everything a generator needs to know about one brand-day
 */
export interface DayContext {
  date: Date;
  seasonal: number;
  weekday: number;
  campaign: string;
}

// Generation options
export const DEFAULT_BRANDS: readonly string[] = ['Radiance', 'GlowUp', 'PureBeauty'];
export const DEFAULT_DAYS = 90;

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export const StartDateSchema = z
  .union([z.date(), z.string().regex(ISO_DAY, 'Expected a YYYY-MM-DD date')])
  .transform((value, ctx) => {
    const date = typeof value === 'string' ? new Date(`${value}T00:00:00.000Z`) : value;
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid start date' });
      return z.NEVER;
    }
    return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  });

export const GenerateOptionsSchema = z.object({
  startDate: StartDateSchema,
  days: z.number().int('Day count must be an integer').min(0, 'Day count cannot be negative').default(DEFAULT_DAYS),
  brands: z
    .array(z.string().trim().min(1, 'Brand names cannot be empty'))
    .min(1, 'At least one brand is required')
    .refine(brands => new Set(brands).size === brands.length, 'Brand names must be unique')
    .default([...DEFAULT_BRANDS]),
  seed: z.union([z.string(), z.number()]).optional()
});

export interface GenerateOptions {
  startDate: Date | string;
  days?: number;
  brands?: string[];
  /** Fixed seed; identical seed and inputs give identical tables */
  seed?: string | number;
}

export type ResolvedGenerateOptions = z.output<typeof GenerateOptionsSchema>;

// Generation result
export interface GenerationResult {
  data: MockDataset;
  metadata: {
    rowCounts: Record<TableName, number>;
    brands: string[];
    startDate: Date;
    days: number;
    seed?: string | number;
    generatedAt: Date;
    cached: boolean;
    duration: number;
  };
}

// Error types
export class SynthError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'SynthError';
  }
}

export class ValidationError extends SynthError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class CacheError extends SynthError {
  constructor(message: string, details?: unknown) {
    super(message, 'CACHE_ERROR', details);
    this.name = 'CacheError';
  }
}

/**
 * Turn a failed zod parse into a ValidationError with the first issue as message
 */
export function toValidationError(error: z.ZodError, context: string): ValidationError {
  const issue = error.issues[0];
  const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return new ValidationError(`${context}: ${path}${issue?.message ?? 'invalid input'}`, {
    issues: error.issues
  });
}

// Lifecycle events
export interface GenerationEvents {
  'generation:start': { options: ResolvedGenerateOptions };
  'generation:complete': { rowCounts: Record<TableName, number>; duration: number };
  'generation:cached': { key: string };
  'generation:error': { error: unknown };
}
