/**
 * Social media follower growth and engagement
 */

import { BaseGenerator } from './base.js';
import type { DayContext, SocialPlatform, SocialRecord } from '../types.js';
import type { RandomSource } from '../random/index.js';
import { round2, uniform, uniformInt } from '../random/index.js';

export const INITIAL_FOLLOWERS = { min: 5000, max: 15000 } as const;
export const DAILY_GROWTH = { min: 1.0005, max: 1.003 } as const;
export const ENGAGEMENT_RANGE = { min: 0.5, max: 8.5 } as const;

/**
 * Running follower counts for one brand. Counts only compound forward, so
 * steps must be fed in date order.
 */
export class FollowerLedger {
  private readonly counts = new Map<SocialPlatform, number>();

  constructor(platforms: readonly SocialPlatform[], random: RandomSource) {
    for (const platform of platforms) {
      this.counts.set(platform, uniformInt(random, INITIAL_FOLLOWERS.min, INITIAL_FOLLOWERS.max));
    }
  }

  current(platform: SocialPlatform): number {
    return this.counts.get(platform) ?? 0;
  }

  /**
   * Apply one day of growth and return the new count
   */
  grow(platform: SocialPlatform, random: RandomSource): number {
    const next = Math.trunc(this.current(platform) * uniform(random, DAILY_GROWTH.min, DAILY_GROWTH.max));
    this.counts.set(platform, next);
    return next;
  }
}

export class SocialGenerator extends BaseGenerator<SocialRecord> {
  readonly table = 'social';

  protected generateForBrand(
    brand: string,
    days: readonly DayContext[],
    random: RandomSource
  ): SocialRecord[] {
    const platforms = this.catalog.socialPlatforms;
    const ledger = new FollowerLedger(platforms, random);
    const records: SocialRecord[] = [];

    for (const day of days) {
      for (const platform of platforms) {
        const followers = ledger.grow(platform, random);
        const engagementRate = round2(uniform(random, ENGAGEMENT_RANGE.min, ENGAGEMENT_RANGE.max));

        records.push({ brand, date: new Date(day.date.getTime()), platform, engagementRate, followers });
      }
    }

    return records;
  }
}
