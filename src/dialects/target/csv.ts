import type { ColumnSpec, TableRow } from '../target';

const escapeCell = (value: string): string => {
  const needsQuote = /[",\r\n]/.test(value);
  const escaped = value.replace(/"/g, '""');
  return needsQuote ? `"${escaped}"` : escaped;
};

const cellText = (value: string | Date | null | undefined): string => {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return value;
};

/** Header row of column names, then one line per row; dates as ISO 8601. */
export const toCsv = (columns: readonly ColumnSpec[], rows: readonly TableRow[]): string => {
  const lines = [columns.map((column) => escapeCell(column.name)).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCell(cellText(row[column.name]))).join(','));
  }
  return lines.join('\r\n');
};
