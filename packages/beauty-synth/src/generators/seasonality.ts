/**
 * Calendar effects on demand
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Friday and Saturday (UTC) draw the extra traffic */
export const HIGH_TRAFFIC_WEEKDAYS: readonly number[] = [5, 6];

/**
 * 1-based day of the year in UTC
 */
export function dayOfYear(date: Date): number {
  const startOfYear = Date.UTC(date.getUTCFullYear(), 0, 1);
  const day = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  return Math.floor((day - startOfYear) / MS_PER_DAY) + 1;
}

/**
 * Yearly sinusoid: about 0.75 in early January, about 1.25 in early July
 */
export function seasonalMultiplier(date: Date): number {
  return 1 + 0.25 * Math.sin(2 * Math.PI * (dayOfYear(date) / 365) - Math.PI / 2);
}

export function weekdayMultiplier(date: Date): number {
  return HIGH_TRAFFIC_WEEKDAYS.includes(date.getUTCDay()) ? 1.1 : 0.9;
}

/**
 * `days` consecutive UTC midnights starting at `start`
 */
export function dateRange(start: Date, days: number): Date[] {
  const first = Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), start.getUTCDate());
  return Array.from({ length: days }, (_, i) => new Date(first + i * MS_PER_DAY));
}
