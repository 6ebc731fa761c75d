/**
 * Assembles the four tables from the per-table generators
 */

import type { DayContext, MockDataset, ResolvedGenerateOptions, TableName } from './types.js';
import type { Catalog } from './catalog/index.js';
import { DEFAULT_CATALOG, categoryWeightsFor } from './catalog/index.js';
import type { RandomSource } from './random/index.js';
import { pick } from './random/index.js';
import {
  MarketingGenerator,
  ReviewsGenerator,
  SalesGenerator,
  SocialGenerator,
  dateRange,
  seasonalMultiplier,
  weekdayMultiplier
} from './generators/index.js';

export class DatasetBuilder {
  private readonly catalog: Catalog;
  private readonly sales: SalesGenerator;
  private readonly marketing: MarketingGenerator;
  private readonly social: SocialGenerator;
  private readonly reviews: ReviewsGenerator;

  constructor(catalog: Catalog = DEFAULT_CATALOG) {
    this.catalog = catalog;
    this.sales = new SalesGenerator(catalog);
    this.marketing = new MarketingGenerator(catalog);
    this.social = new SocialGenerator(catalog);
    this.reviews = new ReviewsGenerator(catalog);
  }

  /**
   * Build a full dataset. Each brand draws from `random.fork(brand)`, so a
   * brand's rows do not depend on which other brands are requested.
   */
  build(options: ResolvedGenerateOptions, random: RandomSource): MockDataset {
    // Fail before generating anything
    for (const brand of options.brands) {
      categoryWeightsFor(this.catalog, brand);
    }

    const dates = dateRange(options.startDate, options.days);

    const perBrand = options.brands.map(brand => {
      const brandRandom = random.fork(`brand:${brand}`);
      const days = this.dayContexts(dates, brandRandom.fork('campaign'));

      return {
        sales: this.sales.generate(brand, days, brandRandom),
        marketing: this.marketing.generate(brand, days, brandRandom),
        social: this.social.generate(brand, days, brandRandom),
        reviews: this.reviews.generate(brand, days, brandRandom)
      };
    });

    return Object.freeze({
      sales: Object.freeze(perBrand.flatMap(tables => tables.sales)),
      marketing: Object.freeze(perBrand.flatMap(tables => tables.marketing)),
      social: Object.freeze(perBrand.flatMap(tables => tables.social)),
      reviews: Object.freeze(perBrand.flatMap(tables => tables.reviews)),
      campaigns: Object.freeze([...this.catalog.campaigns])
    });
  }

  /**
   * Calendar multipliers plus the single campaign running on each day
   */
  dayContexts(dates: readonly Date[], random: RandomSource): DayContext[] {
    return dates.map(date => ({
      date,
      seasonal: seasonalMultiplier(date),
      weekday: weekdayMultiplier(date),
      campaign: pick(random, this.catalog.campaigns)
    }));
  }
}

export function countRows(dataset: MockDataset): Record<TableName, number> {
  return {
    sales: dataset.sales.length,
    marketing: dataset.marketing.length,
    social: dataset.social.length,
    reviews: dataset.reviews.length
  };
}

function withOwnDate<T extends { readonly date: Date }>(row: T): Readonly<T> {
  const copy: T = { ...row, date: new Date(row.date.getTime()) };
  return Object.freeze(copy);
}

/**
 * Deep copy with fresh `Date` instances, so callers cannot reach each
 * other's (or the cache's) dates
 */
export function cloneDataset(dataset: MockDataset): MockDataset {
  return Object.freeze({
    sales: Object.freeze(dataset.sales.map(withOwnDate)),
    marketing: Object.freeze(dataset.marketing.map(withOwnDate)),
    social: Object.freeze(dataset.social.map(withOwnDate)),
    reviews: Object.freeze(dataset.reviews.map(withOwnDate)),
    campaigns: dataset.campaigns
  });
}
