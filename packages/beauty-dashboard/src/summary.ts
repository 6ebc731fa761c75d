/**
 * Headline metrics for the executive summary
 */

import { round2, uniform } from 'beauty-synth';
import type { RandomSource, SalesRecord } from 'beauty-synth';
import { sumBy } from './aggregate.js';

export interface ExecutiveSummary {
  totalRevenue: number;
  unitsSold: number;
  orders: number;
  /** Revenue per unit sold; 0 when nothing sold */
  averageOrderValue: number;
}

export function executiveSummary(sales: readonly SalesRecord[]): ExecutiveSummary {
  const totalRevenue = round2(sumBy(sales, row => row.revenue));
  const unitsSold = sumBy(sales, row => row.qty);

  return {
    totalRevenue,
    unitsSold,
    orders: sales.length,
    averageOrderValue: unitsSold === 0 ? 0 : round2(totalRevenue / unitsSold)
  };
}

/**
 * Customer and marketing KPIs the dataset has no columns for; drawn at
 * report time
 */
export interface SimulatedKpis {
  customerAcquisitionCost: number;
  customerLifetimeValue: number;
  marketingRoi: number;
  /** Percent */
  loyaltyParticipation: number;
  /** Percent */
  repeatPurchaseRate: number;
}

export function simulatedKpis(random: RandomSource): SimulatedKpis {
  return {
    customerAcquisitionCost: round2(uniform(random, 25, 40)),
    customerLifetimeValue: round2(uniform(random, 200, 350)),
    marketingRoi: round2(uniform(random, 2.5, 4.0)),
    loyaltyParticipation: round2(uniform(random, 40, 70)),
    repeatPurchaseRate: round2(uniform(random, 30, 60))
  };
}
