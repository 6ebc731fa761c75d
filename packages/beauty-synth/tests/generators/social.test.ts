/**
 * Tests for the social generator and follower ledger
 */

import { describe, it, expect } from 'vitest';
import { FollowerLedger, SocialGenerator } from '../../src/generators/social.js';
import { dateRange } from '../../src/generators/seasonality.js';
import { SeededRandom } from '../../src/random/index.js';
import type { DayContext, SocialPlatform } from '../../src/types.js';
import { fixedRandom, utcDay } from '../helpers.js';

const PLATFORMS: SocialPlatform[] = ['Instagram', 'Facebook', 'TikTok', 'YouTube'];

function days(count: number): DayContext[] {
  return dateRange(utcDay('2024-11-20'), count).map(date => ({
    date,
    seasonal: 1,
    weekday: 1,
    campaign: 'Holiday Sparkle'
  }));
}

describe('FollowerLedger', () => {
  it('should start every platform between 5,000 and 15,000', () => {
    expect(new FollowerLedger(PLATFORMS, fixedRandom(0)).current('TikTok')).toBe(5000);
    expect(new FollowerLedger(PLATFORMS, fixedRandom(0.99999)).current('TikTok')).toBe(15000);
  });

  it('should compound growth and truncate', () => {
    const ledger = new FollowerLedger(['Instagram'], fixedRandom(0));

    expect(ledger.grow('Instagram', fixedRandom(0))).toBe(5002);
    expect(ledger.grow('Instagram', fixedRandom(0))).toBe(5004);
    expect(ledger.current('Instagram')).toBe(5004);
  });

  it('should keep platforms independent', () => {
    const ledger = new FollowerLedger(['Instagram', 'YouTube'], fixedRandom(0));
    ledger.grow('Instagram', fixedRandom(0.5));

    expect(ledger.current('YouTube')).toBe(5000);
  });
});

describe('SocialGenerator', () => {
  const generator = new SocialGenerator();

  it('should emit one row per platform per day', () => {
    const records = generator.generate('Radiance', days(7), new SeededRandom('social'));
    expect(records).toHaveLength(7 * PLATFORMS.length);
  });

  it('should never lose followers from one day to the next', () => {
    const records = generator.generate('GlowUp', days(60), new SeededRandom('growth'));

    for (const platform of PLATFORMS) {
      const series = records.filter(r => r.platform === platform);
      expect(series).toHaveLength(60);

      for (let i = 1; i < series.length; i++) {
        const previous = series[i - 1];
        const current = series[i];
        if (!previous || !current) continue;
        expect(current.date.getTime()).toBeGreaterThan(previous.date.getTime());
        expect(current.followers).toBeGreaterThanOrEqual(previous.followers);
      }
    }
  });

  it('should keep engagement rates in [0.5, 8.5]', () => {
    const records = generator.generate('PureBeauty', days(30), new SeededRandom('engagement'));

    for (const record of records) {
      expect(record.engagementRate).toBeGreaterThanOrEqual(0.5);
      expect(record.engagementRate).toBeLessThanOrEqual(8.5);
      expect(Number.isInteger(record.followers)).toBe(true);
    }
  });
});
