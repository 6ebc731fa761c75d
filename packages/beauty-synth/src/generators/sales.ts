/**
 * Sales transactions: one row per order
 */

import { BaseGenerator } from './base.js';
import type { DayContext, SalesRecord } from '../types.js';
import type { Category } from '../catalog/index.js';
import { categoryWeightsFor } from '../catalog/index.js';
import type { RandomSource } from '../random/index.js';
import { clamp, exponential, normal, pick, round2, weightedPick } from '../random/index.js';

export const ORDERS_MEAN = 80;
export const ORDERS_STD_DEV = 15;
export const MIN_DAILY_ORDERS = 40;
export const MAX_DAILY_ORDERS = 150;

export const PRICE_STD_DEV_RATIO = 0.15;
export const MIN_PRICE_RATIO = 0.6;
export const MAX_PRICE_RATIO = 1.5;
export const MEAN_QTY = 1.5;

export class SalesGenerator extends BaseGenerator<SalesRecord> {
  readonly table = 'sales';

  protected generateForBrand(
    brand: string,
    days: readonly DayContext[],
    random: RandomSource
  ): SalesRecord[] {
    const weights = categoryWeightsFor(this.catalog, brand);
    const records: SalesRecord[] = [];

    for (const day of days) {
      const orders = this.dailyOrders(day, random);
      for (let i = 0; i < orders; i++) {
        records.push(this.generateOrder(brand, day, weights, random));
      }
    }

    return records;
  }

  /**
   * Order count for one day, bounded whatever the multipliers
   */
  dailyOrders(day: Pick<DayContext, 'seasonal' | 'weekday'>, random: RandomSource): number {
    const mean = ORDERS_MEAN * day.seasonal * day.weekday;
    return Math.trunc(clamp(normal(random, mean, ORDERS_STD_DEV), MIN_DAILY_ORDERS, MAX_DAILY_ORDERS));
  }

  /**
   * Unit price around the category's base price
   */
  unitPrice(category: Pick<Category, 'basePrice'>, random: RandomSource): number {
    const base = category.basePrice;
    const drawn = normal(random, base, base * PRICE_STD_DEV_RATIO);
    return round2(clamp(drawn, base * MIN_PRICE_RATIO, base * MAX_PRICE_RATIO));
  }

  quantity(random: RandomSource): number {
    return Math.max(1, Math.floor(exponential(random, MEAN_QTY)));
  }

  private generateOrder(
    brand: string,
    day: DayContext,
    weights: readonly number[],
    random: RandomSource
  ): SalesRecord {
    const { salesChannels, offers } = this.catalog;

    const category = weightedPick(random, this.catalog.categories, weights);
    const product = pick(random, category.products);
    const channel = weightedPick(random, salesChannels.items, salesChannels.weights);
    const offer = weightedPick(random, offers.items, offers.weights);
    const unitPrice = this.unitPrice(category, random);
    const qty = this.quantity(random);

    return {
      brand,
      date: new Date(day.date.getTime()),
      category: category.name,
      product,
      channel,
      offer,
      campaign: day.campaign,
      qty,
      unitPrice,
      revenue: round2(unitPrice * qty)
    };
  }
}
