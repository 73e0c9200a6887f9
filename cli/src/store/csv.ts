import { parse } from 'csv-parse/sync';

export interface StoredTable {
  columns: string[];
  rows: string[][];
}

function isStringRows(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));
}

/**
 * Parse store contents into a header and data rows. Rows keep the header's
 * column positions; short rows are allowed and read as missing cells.
 */
export function parseTable(content: string): StoredTable {
  const parsed: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!isStringRows(parsed)) {
    throw new Error('Unexpected CSV structure');
  }

  const [columns = [], ...rows] = parsed;
  return { columns, rows };
}

export function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatRow(values: ReadonlyArray<string>): string {
  return `${values.map(escapeField).join(',')}\n`;
}

export function formatTable(table: StoredTable): string {
  return [table.columns, ...table.rows].map(formatRow).join('');
}
