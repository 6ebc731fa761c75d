import { describe, it, expect } from 'vitest';
import {
  customerTrends,
  dailyRevenue,
  emailCampaignPerformance,
  paidCpcSeries,
  paidCtrSeries,
  revenueByBrandAndCategory,
  revenueByBrandAndChannel,
  revenueByOffer,
  sentimentCounts,
  socialSummary,
  topProducts,
  trafficByCampaignAndChannel,
  trafficSeries
} from '../src/views.js';
import { SequenceRandom, marketing, review, sale, social, utcDay } from './fixtures.js';

describe('sales views', () => {
  it('should sum revenue by brand and category', () => {
    const rows = revenueByBrandAndCategory([
      sale({ brand: 'Radiance', category: 'Skincare', revenue: 10.1 }),
      sale({ brand: 'Radiance', category: 'Skincare', revenue: 20.2 }),
      sale({ brand: 'GlowUp', category: 'Makeup', revenue: 5 })
    ]);

    expect(rows).toEqual([
      { brand: 'Radiance', category: 'Skincare', revenue: 30.3 },
      { brand: 'GlowUp', category: 'Makeup', revenue: 5 }
    ]);
  });

  it('should rank products and cap each brand', () => {
    const rows = topProducts(
      [
        sale({ brand: 'Radiance', product: 'Toner', revenue: 30 }),
        sale({ brand: 'Radiance', product: 'Serum', revenue: 50 }),
        sale({ brand: 'GlowUp', product: 'Lipstick', revenue: 40 })
      ],
      1
    );

    expect(rows).toEqual([
      { brand: 'Radiance', product: 'Serum', revenue: 50 },
      { brand: 'GlowUp', product: 'Lipstick', revenue: 40 }
    ]);
  });

  it('should sum revenue by brand and channel', () => {
    const rows = revenueByBrandAndChannel([
      sale({ channel: 'Online', revenue: 12 }),
      sale({ channel: 'Wholesale', revenue: 8 }),
      sale({ channel: 'Online', revenue: 3 })
    ]);

    expect(rows).toEqual([
      { brand: 'Radiance', channel: 'Online', revenue: 15 },
      { brand: 'Radiance', channel: 'Wholesale', revenue: 8 }
    ]);
  });

  it('should order daily revenue by date', () => {
    const rows = dailyRevenue([
      sale({ date: utcDay('2024-01-03'), revenue: 5 }),
      sale({ date: utcDay('2024-01-01'), revenue: 2 }),
      sale({ date: utcDay('2024-01-03'), revenue: 1 })
    ]);

    expect(rows).toEqual([
      { date: '2024-01-01', revenue: 2 },
      { date: '2024-01-03', revenue: 6 }
    ]);
  });

  it('should sum revenue by offer', () => {
    const rows = revenueByOffer([
      sale({ offer: 'Free Gift', revenue: 4 }),
      sale({ offer: 'None', revenue: 6 }),
      sale({ offer: 'Free Gift', revenue: 1 })
    ]);

    expect(rows).toEqual([
      { offer: 'Free Gift', revenue: 5 },
      { offer: 'None', revenue: 6 }
    ]);
  });
});

describe('marketing views', () => {
  const rows = [
    marketing({ channel: 'Paid', traffic: 500, ctr: 2.5, cpc: 1.5 }),
    marketing({ channel: 'Paid', date: utcDay('2024-01-02'), traffic: 300, ctr: 1.2, cpc: null }),
    marketing({ channel: 'Email', campaign: 'Summer Glow', traffic: 100, ctr: 2 }),
    marketing({ channel: 'Email', campaign: 'Summer Glow', traffic: 300, ctr: 4 }),
    marketing({ channel: 'Email', campaign: 'Loyalty Boost', traffic: 50, ctr: 1 })
  ];

  it('should list traffic per row', () => {
    expect(trafficSeries(rows.slice(0, 1))).toEqual([
      { date: '2024-01-01', brand: 'Radiance', channel: 'Paid', traffic: 500 }
    ]);
  });

  it('should keep only paid rows for CTR', () => {
    expect(paidCtrSeries(rows)).toEqual([
      { date: '2024-01-01', brand: 'Radiance', value: 2.5 },
      { date: '2024-01-02', brand: 'Radiance', value: 1.2 }
    ]);
  });

  it('should skip paid rows without a cost per click', () => {
    expect(paidCpcSeries(rows)).toEqual([{ date: '2024-01-01', brand: 'Radiance', value: 1.5 }]);
  });

  it('should sum traffic by campaign and channel', () => {
    expect(trafficByCampaignAndChannel(rows)).toEqual([
      { campaign: 'Summer Glow', channel: 'Paid', traffic: 800 },
      { campaign: 'Summer Glow', channel: 'Email', traffic: 400 },
      { campaign: 'Loyalty Boost', channel: 'Email', traffic: 50 }
    ]);
  });

  it('should derive email open and conversion rates from CTR', () => {
    // Factors: open 20 + 0.5 * 20 = 30, conversion 5 + 0.5 * 10 = 10
    const random = new SequenceRandom([0.5]);

    expect(emailCampaignPerformance(rows, random)).toEqual([
      { campaign: 'Summer Glow', traffic: 400, ctr: 3, openRate: 0.9, conversionRate: 0.3 },
      { campaign: 'Loyalty Boost', traffic: 50, ctr: 1, openRate: 0.3, conversionRate: 0.1 }
    ]);
    expect(random.draws).toBe(2);
  });
});

describe('customerTrends', () => {
  it('should accumulate new and returning buyers by date', () => {
    const sales = [
      sale({ date: utcDay('2024-01-02') }),
      sale({ date: utcDay('2024-01-02') }),
      sale({ date: utcDay('2024-01-01') })
    ];
    // 2024-01-02 is grouped first: 0.1 new, 0.9 returning; then 2024-01-01: 0.2 new
    const random = new SequenceRandom([0.1, 0.9, 0.2]);

    expect(customerTrends(sales, random)).toEqual([
      { date: '2024-01-01', newCustomers: 1, returningCustomers: 0 },
      { date: '2024-01-02', newCustomers: 2, returningCustomers: 1 }
    ]);
  });

  it('should be empty without sales', () => {
    expect(customerTrends([], new SequenceRandom([0]))).toEqual([]);
  });
});

describe('brand views', () => {
  it('should count reviews by brand and sentiment', () => {
    const rows = sentimentCounts([
      review({ sentiment: 'Positive' }),
      review({ sentiment: 'Negative', rating: 1 }),
      review({ sentiment: 'Positive', rating: 4 }),
      review({ brand: 'GlowUp', sentiment: 'Neutral', rating: 3 })
    ]);

    expect(rows).toEqual([
      { brand: 'Radiance', sentiment: 'Positive', count: 2 },
      { brand: 'Radiance', sentiment: 'Negative', count: 1 },
      { brand: 'GlowUp', sentiment: 'Neutral', count: 1 }
    ]);
  });

  it('should average engagement and keep the largest follower count', () => {
    const rows = socialSummary([
      social({ engagementRate: 2, followers: 100 }),
      social({ engagementRate: 3.5, followers: 102 }),
      social({ platform: 'TikTok', engagementRate: 7.25, followers: 40 })
    ]);

    expect(rows).toEqual([
      { brand: 'Radiance', platform: 'Instagram', engagementRate: 2.75, followers: 102 },
      { brand: 'Radiance', platform: 'TikTok', engagementRate: 7.25, followers: 40 }
    ]);
  });
});
