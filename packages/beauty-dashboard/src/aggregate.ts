/**
 * Group-by helpers behind the chart series
 */

export interface Rollup<K, V> {
  key: K;
  value: V;
}

/**
 * Group rows by a composite key and reduce each group. Groups keep the
 * order in which their first row appeared.
 */
export function rollup<T, K extends Record<string, string>, V>(
  rows: readonly T[],
  keyOf: (row: T) => K,
  reduce: (group: T[]) => V
): Rollup<K, V>[] {
  const groups = new Map<string, { key: K; rows: T[] }>();

  for (const row of rows) {
    const key = keyOf(row);
    const id = JSON.stringify(Object.entries(key));
    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  return [...groups.values()].map(group => ({ key: group.key, value: reduce(group.rows) }));
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Arithmetic mean; 0 for no values
 */
export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

export function max(values: readonly number[]): number {
  return values.reduce((best, value) => Math.max(best, value), Number.NEGATIVE_INFINITY);
}

export function sumBy<T>(rows: readonly T[], valueOf: (row: T) => number): number {
  return sum(rows.map(valueOf));
}
