// decoded-table.ts - Header-driven parsing of the decoder's delimited export
import { ColumnIndex, DecodedRow, DecodedTable } from '../types';

const HEADER_MARKER = '#';
const RESTART_MARKER = 'LINUX-RESTART';

export function buildColumnIndex(header: string[]): ColumnIndex {
  const index = new Map<string, number>();
  header.forEach((name, i) => {
    // first occurrence wins when a decoder repeats a column name
    if (!index.has(name)) index.set(name, i);
  });
  return index;
}

function splitHeader(line: string, delimiter: string): string[] {
  const body = line.slice(HEADER_MARKER.length).trim();
  return body.split(delimiter).map(name => name.trim());
}

/**
 * Parse `sadf -d -H` style output. Each row remembers the header it was read
 * under, because sadf prints a fresh header after a restart and the column set
 * may differ across it.
 */
export function parseDecodedTable(text: string, delimiter: string = ';'): DecodedTable | null {
  let header: string[] | null = null;
  let columns: ColumnIndex = new Map();
  const rows: DecodedRow[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith(HEADER_MARKER)) {
      const names = splitHeader(line, delimiter);
      columns = buildColumnIndex(names);
      if (!header) header = names;
      continue;
    }

    if (!header) continue; // data before any header cannot be resolved by name
    if (line.includes(RESTART_MARKER)) continue;

    rows.push({ columns, values: line.split(delimiter).map(v => v.trim()) });
  }

  if (!header) return null;
  return { header, rows };
}

export function cell(row: DecodedRow, column: string): string | undefined {
  const index = row.columns.get(column);
  if (index === undefined) return undefined;
  return row.values[index];
}

export function hasColumn(row: DecodedRow, column: string): boolean {
  return row.columns.has(column);
}

/**
 * Lenient numeric parse: the leading number of the field is taken, and a
 * field with no leading number is 0.
 */
export function parseNumber(raw: string | undefined): number {
  if (raw === undefined) return 0;
  const value = Number.parseFloat(raw.trim());
  return Number.isFinite(value) ? value : 0;
}
