/**
 * Daily marketing metrics per acquisition channel
 */

import { BaseGenerator } from './base.js';
import type { DayContext, MarketingRecord } from '../types.js';
import type { RandomSource } from '../random/index.js';
import { clamp, normal, round2, uniform } from '../random/index.js';

export const TRAFFIC_STD_DEV_RATIO = 0.1;
export const TRAFFIC_RANGE = { min: 100, max: 5000 } as const;
export const CTR_RANGE = { min: 0.3, max: 4.5 } as const;
export const CPC_RANGE = { min: 0.3, max: 2.0 } as const;

export class MarketingGenerator extends BaseGenerator<MarketingRecord> {
  readonly table = 'marketing';

  protected generateForBrand(
    brand: string,
    days: readonly DayContext[],
    random: RandomSource
  ): MarketingRecord[] {
    const records: MarketingRecord[] = [];

    for (const day of days) {
      for (const { channel, baseTraffic } of this.catalog.marketingChannels) {
        const traffic = Math.trunc(
          clamp(
            normal(random, baseTraffic * day.seasonal, baseTraffic * TRAFFIC_STD_DEV_RATIO),
            TRAFFIC_RANGE.min,
            TRAFFIC_RANGE.max
          )
        );
        const ctr = round2(uniform(random, CTR_RANGE.min, CTR_RANGE.max));
        const cpc = channel === 'Paid' ? round2(uniform(random, CPC_RANGE.min, CPC_RANGE.max)) : null;

        records.push({
          brand,
          date: new Date(day.date.getTime()),
          channel,
          campaign: day.campaign,
          traffic,
          ctr,
          cpc
        });
      }
    }

    return records;
  }
}
