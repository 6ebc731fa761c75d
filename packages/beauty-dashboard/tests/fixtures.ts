/**
 * Hand-built rows and a scripted random source
 */

import type {
  MarketingRecord,
  MockDataset,
  RandomSource,
  ReviewRecord,
  SalesRecord,
  SocialRecord
} from 'beauty-synth';

export function utcDay(day: string): Date {
  return new Date(`${day}T00:00:00.000Z`);
}

/**
 * Replays the given draws in a loop; forks share the sequence
 */
export class SequenceRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  next(): number {
    const value = this.values[this.index % this.values.length] ?? 0;
    this.index++;
    return value;
  }

  fork(): RandomSource {
    return this;
  }

  get draws(): number {
    return this.index;
  }
}

export function sale(overrides: Partial<SalesRecord> = {}): SalesRecord {
  return {
    brand: 'Radiance',
    date: utcDay('2024-01-01'),
    category: 'Skincare',
    product: 'Hydrating Serum',
    channel: 'Online',
    offer: 'None',
    campaign: 'Summer Glow',
    qty: 1,
    unitPrice: 10,
    revenue: 10,
    ...overrides
  };
}

export function marketing(overrides: Partial<MarketingRecord> = {}): MarketingRecord {
  return {
    brand: 'Radiance',
    date: utcDay('2024-01-01'),
    channel: 'Organic',
    campaign: 'Summer Glow',
    traffic: 100,
    ctr: 1,
    cpc: null,
    ...overrides
  };
}

export function social(overrides: Partial<SocialRecord> = {}): SocialRecord {
  return {
    brand: 'Radiance',
    date: utcDay('2024-01-01'),
    platform: 'Instagram',
    engagementRate: 2,
    followers: 1000,
    ...overrides
  };
}

export function review(overrides: Partial<ReviewRecord> = {}): ReviewRecord {
  return {
    brand: 'Radiance',
    date: utcDay('2024-01-01'),
    sentiment: 'Positive',
    rating: 5,
    ...overrides
  };
}

export function dataset(tables: Partial<MockDataset> = {}): MockDataset {
  return {
    sales: [],
    marketing: [],
    social: [],
    reviews: [],
    campaigns: ['Summer Glow', 'Holiday Sparkle'],
    ...tables
  };
}
