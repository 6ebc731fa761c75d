import { describe, it, expect } from 'vitest';
import { ValidationError } from 'beauty-synth';
import { filterDataset, parseFilters } from '../src/filters.js';
import { dataset, marketing, review, sale, social, utcDay } from './fixtures.js';

describe('parseFilters', () => {
  it('should turn date strings into UTC days', () => {
    const filters = parseFilters({ brands: ['Radiance'], from: '2024-01-02', to: '2024-01-05' });

    expect(filters.brands).toEqual(['Radiance']);
    expect(filters.from).toEqual(utcDay('2024-01-02'));
    expect(filters.to).toEqual(utcDay('2024-01-05'));
  });

  it('should accept an empty filter set', () => {
    expect(parseFilters({})).toEqual({});
  });

  it('should reject a start after the end', () => {
    expect(() => parseFilters({ from: '2024-02-01', to: '2024-01-01' })).toThrow(
      'Invalid filters: from: Filter start must not be after filter end'
    );
  });

  it('should reject malformed dates', () => {
    expect(() => parseFilters({ from: '01/02/2024' })).toThrow(ValidationError);
  });
});

describe('filterDataset', () => {
  const data = dataset({
    sales: [
      sale({ brand: 'Radiance', date: utcDay('2024-01-01'), campaign: 'Holiday Sparkle' }),
      sale({ brand: 'GlowUp', date: utcDay('2024-01-02'), campaign: 'Summer Glow' }),
      sale({ brand: 'Radiance', date: utcDay('2024-01-03'), campaign: 'Summer Glow' })
    ],
    marketing: [
      marketing({ brand: 'Radiance', campaign: 'Holiday Sparkle' }),
      marketing({ brand: 'GlowUp', campaign: 'Summer Glow' })
    ],
    social: [
      social({ date: new Date('2024-01-02T15:30:00.000Z') }),
      social({ date: utcDay('2024-01-03') })
    ],
    reviews: [review({ brand: 'Radiance' }), review({ brand: 'GlowUp' })]
  });

  it('should keep everything without filters', () => {
    const view = filterDataset(data, {});

    expect(view.sales).toHaveLength(3);
    expect(view.marketing).toHaveLength(2);
    expect(view.social).toHaveLength(2);
    expect(view.reviews).toHaveLength(2);
    expect(view.campaigns).toEqual(['Summer Glow', 'Holiday Sparkle']);
  });

  it('should filter every table by brand', () => {
    const view = filterDataset(data, { brands: ['Radiance'] });

    expect(view.sales.map(row => row.date)).toEqual([utcDay('2024-01-01'), utcDay('2024-01-03')]);
    expect(view.marketing.map(row => row.campaign)).toEqual(['Holiday Sparkle']);
    expect(view.reviews).toHaveLength(1);
  });

  it('should apply campaigns to sales and marketing only', () => {
    const view = filterDataset(data, { campaigns: ['Summer Glow'] });

    expect(view.sales.map(row => row.brand)).toEqual(['GlowUp', 'Radiance']);
    expect(view.marketing.map(row => row.brand)).toEqual(['GlowUp']);
    expect(view.social).toHaveLength(2);
    expect(view.reviews).toHaveLength(2);
  });

  it('should include both ends of the date range by UTC day', () => {
    const view = filterDataset(data, { from: utcDay('2024-01-02'), to: utcDay('2024-01-02') });

    expect(view.sales.map(row => row.brand)).toEqual(['GlowUp']);
    expect(view.social).toHaveLength(1);
    expect(view.social[0]?.date).toEqual(new Date('2024-01-02T15:30:00.000Z'));
  });
});
