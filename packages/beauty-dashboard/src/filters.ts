/**
 * Sidebar-style filters over a generated dataset
 */

import { z } from 'zod';
import { StartDateSchema, toValidationError } from 'beauty-synth';
import type { MockDataset } from 'beauty-synth';

export interface DashboardFilters {
  brands?: string[];
  campaigns?: string[];
  /** Inclusive, compared by UTC day */
  from?: Date;
  /** Inclusive, compared by UTC day */
  to?: Date;
}

export const DashboardFiltersSchema = z
  .object({
    brands: z.array(z.string()).optional(),
    campaigns: z.array(z.string()).optional(),
    from: StartDateSchema.optional(),
    to: StartDateSchema.optional()
  })
  .refine(f => !f.from || !f.to || f.from.getTime() <= f.to.getTime(), {
    message: 'Filter start must not be after filter end',
    path: ['from']
  });

export type RawDashboardFilters = z.input<typeof DashboardFiltersSchema>;

export function parseFilters(raw: RawDashboardFilters): DashboardFilters {
  const parsed = DashboardFiltersSchema.safeParse(raw);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'Invalid filters');
  }
  return parsed.data;
}

interface Dated {
  brand: string;
  date: Date;
}

function startOfDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function matchesBrandAndDate(row: Dated, filters: DashboardFilters): boolean {
  if (filters.brands && !filters.brands.includes(row.brand)) return false;

  const day = startOfDay(row.date);
  if (filters.from && day < startOfDay(filters.from)) return false;
  if (filters.to && day > startOfDay(filters.to)) return false;

  return true;
}

function matchesCampaign(row: { campaign: string }, filters: DashboardFilters): boolean {
  return !filters.campaigns || filters.campaigns.includes(row.campaign);
}

/**
 * New tables holding the rows that pass the filters. Social and review rows
 * carry no campaign, so the campaign filter skips them.
 */
export function filterDataset(dataset: MockDataset, filters: DashboardFilters): MockDataset {
  return {
    sales: dataset.sales.filter(row => matchesBrandAndDate(row, filters) && matchesCampaign(row, filters)),
    marketing: dataset.marketing.filter(
      row => matchesBrandAndDate(row, filters) && matchesCampaign(row, filters)
    ),
    social: dataset.social.filter(row => matchesBrandAndDate(row, filters)),
    reviews: dataset.reviews.filter(row => matchesBrandAndDate(row, filters)),
    campaigns: dataset.campaigns
  };
}
