/**
 * Product, channel and brand configuration behind the generators
 *
 * The catalog is plain data validated with zod so callers can swap in
 * their own brands, prices or weights.
 */

import { z } from 'zod';
import {
  MarketingChannelSchema,
  OfferSchema,
  SalesChannelSchema,
  SentimentSchema,
  SocialPlatformSchema,
  ValidationError,
  toValidationError
} from '../types.js';
import { defaultCatalog } from './defaults.js';

const WEIGHT_TOLERANCE = 1e-6;

const weightsSchema = z
  .array(z.number().nonnegative())
  .min(1)
  .refine(w => Math.abs(w.reduce((sum, x) => sum + x, 0) - 1) <= WEIGHT_TOLERANCE, 'Weights must sum to 1');

const weightedSchema = <T extends z.ZodTypeAny>(item: T) =>
  z
    .object({ items: z.array(item).min(1), weights: weightsSchema })
    .refine(v => v.items.length === v.weights.length, 'Each item needs exactly one weight');

export const CategorySchema = z.object({
  name: z.string().min(1),
  basePrice: z.number().min(0.01),
  products: z.array(z.string().min(1)).min(1)
});

export const CatalogSchema = z
  .object({
    categories: z.array(CategorySchema).min(1),
    /** One weight per category, in category order */
    brandCategoryWeights: z.record(z.string(), weightsSchema),
    salesChannels: weightedSchema(SalesChannelSchema),
    offers: weightedSchema(OfferSchema),
    marketingChannels: z.array(
      z.object({ channel: MarketingChannelSchema, baseTraffic: z.number().positive() })
    ).min(1),
    socialPlatforms: z.array(SocialPlatformSchema).min(1),
    campaigns: z.array(z.string().min(1)).min(1),
    sentiments: weightedSchema(SentimentSchema),
    reviewsPerBrand: z.number().int().nonnegative()
  })
  .superRefine((catalog, ctx) => {
    for (const [brand, weights] of Object.entries(catalog.brandCategoryWeights)) {
      if (weights.length !== catalog.categories.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['brandCategoryWeights', brand],
          message: `Expected ${catalog.categories.length} category weights, got ${weights.length}`
        });
      }
    }
  });

export type Category = z.infer<typeof CategorySchema>;
export type Catalog = z.infer<typeof CatalogSchema>;

export function parseCatalog(input: unknown): Catalog {
  const parsed = CatalogSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'Invalid catalog');
  }
  return parsed.data;
}

export const DEFAULT_CATALOG: Catalog = parseCatalog(defaultCatalog);

export function categoryWeightsFor(catalog: Catalog, brand: string): number[] {
  const weights = catalog.brandCategoryWeights[brand];
  if (!weights) {
    throw new ValidationError(`Unknown brand "${brand}"`, {
      brand,
      knownBrands: Object.keys(catalog.brandCategoryWeights)
    });
  }
  return weights;
}
