/**
 * Serialize generated tables for files and downstream tools
 */

export type ExportFormat = 'json' | 'csv';

type Row = object;

/**
 * `YYYY-MM-DD` for a UTC-midnight date
 */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function toJSON(rows: readonly Row[]): string {
  return JSON.stringify(rows, null, 2);
}

/**
 * CSV with a header taken from the first row's keys
 */
export function toCSV(rows: readonly Row[]): string {
  const first = rows[0];
  if (!first) return '';

  const headers = Object.keys(first);
  const lines = rows.map(row => {
    const record = new Map(Object.entries(row));
    return headers.map(header => csvCell(record.get(header))).join(',');
  });

  return [headers.join(','), ...lines].join('\n');
}

export function formatTable(rows: readonly Row[], format: ExportFormat): string {
  return format === 'csv' ? toCSV(rows) : toJSON(rows);
}

function csvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatDay(value);

  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
