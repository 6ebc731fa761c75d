/**
 * Series behind each dashboard chart
 */

import { formatDay, round2, uniform } from 'beauty-synth';
import type {
  MarketingChannel,
  MarketingRecord,
  Offer,
  RandomSource,
  ReviewRecord,
  SalesChannel,
  SalesRecord,
  Sentiment,
  SocialPlatform,
  SocialRecord
} from 'beauty-synth';
import { max, mean, rollup, sumBy } from './aggregate.js';

export const TOP_PRODUCTS_PER_BRAND = 10;
export const NEW_CUSTOMER_SHARE = 0.35;

// Sales & revenue

export interface CategoryRevenue {
  brand: string;
  category: string;
  revenue: number;
}

export function revenueByBrandAndCategory(sales: readonly SalesRecord[]): CategoryRevenue[] {
  return rollup(
    sales,
    row => ({ brand: row.brand, category: row.category }),
    rows => round2(sumBy(rows, r => r.revenue))
  ).map(({ key, value }) => ({ ...key, revenue: value }));
}

export interface ProductRevenue {
  brand: string;
  product: string;
  revenue: number;
}

/**
 * Best-selling products of each brand, highest revenue first
 */
export function topProducts(
  sales: readonly SalesRecord[],
  limit: number = TOP_PRODUCTS_PER_BRAND
): ProductRevenue[] {
  const totals = rollup(
    sales,
    row => ({ brand: row.brand, product: row.product }),
    rows => round2(sumBy(rows, r => r.revenue))
  )
    .map(({ key, value }) => ({ ...key, revenue: value }))
    .sort((a, b) => b.revenue - a.revenue);

  const taken = new Map<string, number>();
  return totals.filter(row => {
    const count = taken.get(row.brand) ?? 0;
    taken.set(row.brand, count + 1);
    return count < limit;
  });
}

export interface ChannelRevenue {
  brand: string;
  channel: SalesChannel;
  revenue: number;
}

export function revenueByBrandAndChannel(sales: readonly SalesRecord[]): ChannelRevenue[] {
  return rollup(
    sales,
    row => ({ brand: row.brand, channel: row.channel }),
    rows => round2(sumBy(rows, r => r.revenue))
  ).map(({ key, value }) => ({ ...key, revenue: value }));
}

export interface DailyRevenue {
  date: string;
  revenue: number;
}

export function dailyRevenue(sales: readonly SalesRecord[]): DailyRevenue[] {
  return rollup(
    sales,
    row => ({ date: formatDay(row.date) }),
    rows => round2(sumBy(rows, r => r.revenue))
  )
    .map(({ key, value }) => ({ date: key.date, revenue: value }))
    .sort((a, b) => a.date.localeCompare(b.date));
}

export interface OfferRevenue {
  offer: Offer;
  revenue: number;
}

export function revenueByOffer(sales: readonly SalesRecord[]): OfferRevenue[] {
  return rollup(
    sales,
    row => ({ offer: row.offer }),
    rows => round2(sumBy(rows, r => r.revenue))
  ).map(({ key, value }) => ({ offer: key.offer, revenue: value }));
}

// Marketing

export interface TrafficPoint {
  date: string;
  brand: string;
  channel: MarketingChannel;
  traffic: number;
}

export function trafficSeries(marketing: readonly MarketingRecord[]): TrafficPoint[] {
  return marketing.map(row => ({
    date: formatDay(row.date),
    brand: row.brand,
    channel: row.channel,
    traffic: row.traffic
  }));
}

export interface PaidAdPoint {
  date: string;
  brand: string;
  value: number;
}

export function paidCtrSeries(marketing: readonly MarketingRecord[]): PaidAdPoint[] {
  return marketing
    .filter(row => row.channel === 'Paid')
    .map(row => ({ date: formatDay(row.date), brand: row.brand, value: row.ctr }));
}

/**
 * Paid rows that carry a cost per click
 */
export function paidCpcSeries(marketing: readonly MarketingRecord[]): PaidAdPoint[] {
  const points: PaidAdPoint[] = [];
  for (const row of marketing) {
    if (row.channel === 'Paid' && row.cpc !== null) {
      points.push({ date: formatDay(row.date), brand: row.brand, value: row.cpc });
    }
  }
  return points;
}

export interface CampaignTraffic {
  campaign: string;
  channel: MarketingChannel;
  traffic: number;
}

export function trafficByCampaignAndChannel(marketing: readonly MarketingRecord[]): CampaignTraffic[] {
  return rollup(
    marketing,
    row => ({ campaign: row.campaign, channel: row.channel }),
    rows => sumBy(rows, r => r.traffic)
  ).map(({ key, value }) => ({ ...key, traffic: value }));
}

export interface EmailCampaignPerformance {
  campaign: string;
  traffic: number;
  /** Mean click-through rate */
  ctr: number;
  openRate: number;
  conversionRate: number;
}

/**
 * Email results per campaign. Open and conversion rates are simulated from
 * CTR with one factor drawn per call.
 */
export function emailCampaignPerformance(
  marketing: readonly MarketingRecord[],
  random: RandomSource
): EmailCampaignPerformance[] {
  const openFactor = uniform(random, 20, 40);
  const conversionFactor = uniform(random, 5, 15);

  return rollup(
    marketing.filter(row => row.channel === 'Email'),
    row => ({ campaign: row.campaign }),
    rows => ({ traffic: sumBy(rows, r => r.traffic), ctr: mean(rows.map(r => r.ctr)) })
  ).map(({ key, value }) => ({
    campaign: key.campaign,
    traffic: value.traffic,
    ctr: round2(value.ctr),
    openRate: round2((value.ctr * openFactor) / 100),
    conversionRate: round2((value.ctr * conversionFactor) / 100)
  }));
}

// Customers

export interface CustomerTrendPoint {
  date: string;
  newCustomers: number;
  returningCustomers: number;
}

/**
 * Running totals of new and returning buyers. Each sale is flagged new
 * with probability {@link NEW_CUSTOMER_SHARE}.
 */
export function customerTrends(sales: readonly SalesRecord[], random: RandomSource): CustomerTrendPoint[] {
  const daily = rollup(
    sales,
    row => ({ date: formatDay(row.date) }),
    rows => {
      let fresh = 0;
      for (let i = 0; i < rows.length; i++) {
        if (random.next() < NEW_CUSTOMER_SHARE) fresh++;
      }
      return { fresh, returning: rows.length - fresh };
    }
  ).sort((a, b) => a.key.date.localeCompare(b.key.date));

  let newCustomers = 0;
  let returningCustomers = 0;
  return daily.map(({ key, value }) => {
    newCustomers += value.fresh;
    returningCustomers += value.returning;
    return { date: key.date, newCustomers, returningCustomers };
  });
}

// Brand awareness & social

export interface SentimentCount {
  brand: string;
  sentiment: Sentiment;
  count: number;
}

export function sentimentCounts(reviews: readonly ReviewRecord[]): SentimentCount[] {
  return rollup(
    reviews,
    row => ({ brand: row.brand, sentiment: row.sentiment }),
    rows => rows.length
  ).map(({ key, value }) => ({ ...key, count: value }));
}

export interface SocialSummary {
  brand: string;
  platform: SocialPlatform;
  engagementRate: number;
  followers: number;
}

/**
 * Mean engagement and latest (largest) follower count per brand and platform
 */
export function socialSummary(social: readonly SocialRecord[]): SocialSummary[] {
  return rollup(
    social,
    row => ({ brand: row.brand, platform: row.platform }),
    rows => ({
      engagementRate: round2(mean(rows.map(r => r.engagementRate))),
      followers: max(rows.map(r => r.followers))
    })
  ).map(({ key, value }) => ({ ...key, ...value }));
}
