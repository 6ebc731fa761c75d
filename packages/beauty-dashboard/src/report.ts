/**
 * Full dashboard report: every view plus the summary, and a terminal rendering
 */

import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { formatDay, round2 } from 'beauty-synth';
import type { MockDataset, RandomSource } from 'beauty-synth';
import { mean } from './aggregate.js';
import { filterDataset } from './filters.js';
import type { DashboardFilters } from './filters.js';
import { executiveSummary, simulatedKpis } from './summary.js';
import type { ExecutiveSummary, SimulatedKpis } from './summary.js';
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
} from './views.js';
import type {
  CampaignTraffic,
  CategoryRevenue,
  ChannelRevenue,
  CustomerTrendPoint,
  DailyRevenue,
  EmailCampaignPerformance,
  OfferRevenue,
  PaidAdPoint,
  ProductRevenue,
  SentimentCount,
  SocialSummary,
  TrafficPoint
} from './views.js';

export interface DashboardReport {
  filters: DashboardFilters;
  summary: ExecutiveSummary;
  kpis: SimulatedKpis;
  sales: {
    byCategory: CategoryRevenue[];
    topProducts: ProductRevenue[];
    byChannel: ChannelRevenue[];
    daily: DailyRevenue[];
    byOffer: OfferRevenue[];
  };
  marketing: {
    traffic: TrafficPoint[];
    paidCtr: PaidAdPoint[];
    paidCpc: PaidAdPoint[];
    campaignTraffic: CampaignTraffic[];
    email: EmailCampaignPerformance[];
  };
  customers: CustomerTrendPoint[];
  sentiment: SentimentCount[];
  social: SocialSummary[];
}

export function buildReport(
  dataset: MockDataset,
  filters: DashboardFilters,
  random: RandomSource
): DashboardReport {
  const view = filterDataset(dataset, filters);

  return {
    filters,
    summary: executiveSummary(view.sales),
    kpis: simulatedKpis(random.fork('kpis')),
    sales: {
      byCategory: revenueByBrandAndCategory(view.sales),
      topProducts: topProducts(view.sales),
      byChannel: revenueByBrandAndChannel(view.sales),
      daily: dailyRevenue(view.sales),
      byOffer: revenueByOffer(view.sales)
    },
    marketing: {
      traffic: trafficSeries(view.marketing),
      paidCtr: paidCtrSeries(view.marketing),
      paidCpc: paidCpcSeries(view.marketing),
      campaignTraffic: trafficByCampaignAndChannel(view.marketing),
      email: emailCampaignPerformance(view.marketing, random.fork('email'))
    },
    customers: customerTrends(view.sales, random.fork('customers')),
    sentiment: sentimentCounts(view.reviews),
    social: socialSummary(view.social)
  };
}

const numberFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const moneyFormat = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export interface RenderOptions {
  color?: boolean;
}

/**
 * Plain-text rendering of the report's headline numbers and tables
 */
export function renderReport(report: DashboardReport, options: RenderOptions = {}): string {
  const c: ChalkInstance = new Chalk(options.color === false ? { level: 0 } : {});
  const heading = (text: string) => c.bold.magenta(text);
  const lines: string[] = [];

  const { summary, kpis, filters } = report;
  lines.push(heading('Beauty Business Dashboard'));
  lines.push(describeFilters(filters));
  lines.push('');

  lines.push(heading('Executive Summary'));
  lines.push(`  Total Revenue:          $${numberFormat.format(summary.totalRevenue)}`);
  lines.push(`  Total Units Sold:       ${numberFormat.format(summary.unitsSold)}`);
  lines.push(`  Average Order Value:    $${moneyFormat.format(summary.averageOrderValue)}`);
  lines.push(`  Customer Acq. Cost:     $${moneyFormat.format(kpis.customerAcquisitionCost)}`);
  lines.push(`  Customer Lifetime Val.: $${moneyFormat.format(kpis.customerLifetimeValue)}`);
  lines.push(`  Marketing ROI:          ${kpis.marketingRoi}x`);
  lines.push(`  Loyalty Participation:  ${kpis.loyaltyParticipation}%`);
  lines.push(`  Repeat Purchase Rate:   ${kpis.repeatPurchaseRate}%`);
  lines.push('');

  lines.push(heading('Revenue by Category & Brand'));
  for (const row of report.sales.byCategory) {
    lines.push(`  ${row.brand.padEnd(12)} ${row.category.padEnd(10)} $${moneyFormat.format(row.revenue)}`);
  }
  lines.push('');

  lines.push(heading('Top Products by Revenue'));
  for (const row of report.sales.topProducts) {
    lines.push(`  ${row.brand.padEnd(12)} ${row.product.padEnd(20)} $${moneyFormat.format(row.revenue)}`);
  }
  lines.push('');

  lines.push(heading('Revenue by Channel & Brand'));
  for (const row of report.sales.byChannel) {
    lines.push(`  ${row.brand.padEnd(12)} ${row.channel.padEnd(10)} $${moneyFormat.format(row.revenue)}`);
  }
  lines.push('');

  lines.push(heading('Daily Revenue'));
  lines.push(describeDailyRevenue(report.sales.daily));
  lines.push('');

  lines.push(heading('Revenue by Promotion Type'));
  for (const row of report.sales.byOffer) {
    lines.push(`  ${row.offer.padEnd(12)} $${moneyFormat.format(row.revenue)}`);
  }
  lines.push('');

  lines.push(heading('Website Traffic by Channel'));
  for (const [channel, traffic] of trafficByChannel(report.marketing.traffic)) {
    lines.push(`  ${channel.padEnd(8)} ${numberFormat.format(traffic)}`);
  }
  lines.push('');

  lines.push(heading('Paid Ads'));
  if (report.marketing.paidCtr.length === 0) {
    lines.push('  No paid traffic');
  } else {
    lines.push(`  Average CTR:  ${round2(mean(report.marketing.paidCtr.map(p => p.value)))}%`);
    lines.push(`  Average CPC:  $${moneyFormat.format(mean(report.marketing.paidCpc.map(p => p.value)))}`);
  }
  lines.push('');

  lines.push(heading('Traffic by Campaign & Channel'));
  for (const row of report.marketing.campaignTraffic) {
    lines.push(`  ${row.campaign.padEnd(16)} ${row.channel.padEnd(8)} ${numberFormat.format(row.traffic)}`);
  }
  lines.push('');

  lines.push(heading('Email Campaign Performance'));
  for (const row of report.marketing.email) {
    lines.push(
      `  ${row.campaign.padEnd(16)} open ${row.openRate}%, conversion ${row.conversionRate}% (${numberFormat.format(row.traffic)} visits)`
    );
  }
  lines.push('');

  lines.push(heading('New vs Returning Customers'));
  const latest = report.customers[report.customers.length - 1];
  lines.push(
    latest
      ? `  New: ${numberFormat.format(latest.newCustomers)}  Returning: ${numberFormat.format(latest.returningCustomers)}`
      : '  No sales'
  );
  lines.push('');

  lines.push(heading('Review Sentiment by Brand'));
  for (const row of report.sentiment) {
    lines.push(`  ${row.brand.padEnd(12)} ${row.sentiment.padEnd(8)} ${row.count}`);
  }
  lines.push('');

  lines.push(heading('Social Followers & Engagement'));
  for (const row of report.social) {
    lines.push(
      `  ${row.brand.padEnd(12)} ${row.platform.padEnd(10)} ${numberFormat.format(row.followers)} followers, ${row.engagementRate}% engagement`
    );
  }

  return lines.join('\n');
}

function describeDailyRevenue(daily: readonly DailyRevenue[]): string {
  let best: DailyRevenue | undefined;
  for (const day of daily) {
    if (!best || day.revenue > best.revenue) best = day;
  }
  if (!best) return '  No sales';

  const span = `${daily.length} day${daily.length === 1 ? '' : 's'}`;
  return `  ${span}, best ${best.date} at $${moneyFormat.format(best.revenue)}`;
}

/**
 * Channel totals in first-seen order
 */
function trafficByChannel(points: readonly TrafficPoint[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const point of points) {
    totals.set(point.channel, (totals.get(point.channel) ?? 0) + point.traffic);
  }
  return totals;
}

function describeFilters(filters: DashboardFilters): string {
  const parts = [
    `brands: ${filters.brands?.join(', ') ?? 'all'}`,
    `campaigns: ${filters.campaigns?.join(', ') ?? 'all'}`,
    `from: ${filters.from ? formatDay(filters.from) : 'start'}`,
    `to: ${filters.to ? formatDay(filters.to) : 'end'}`
  ];
  return parts.join(' | ');
}
