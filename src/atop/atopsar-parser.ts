// atopsar-parser.ts - Parse `atopsar -S` top-process lines
export type AtopMetric = 'cpu' | 'mem' | 'dsk' | 'net';

export const ATOP_METRICS: readonly AtopMetric[] = ['cpu', 'mem', 'dsk', 'net'];

export interface ProcessEntry {
  hour: string;
  pid: string;
  command: string;
  value: number;
}

const TOP_LINE = /^\d{2}:\d{2}:\d{2}/;
const PID = /^\d+$/;
const RECORD_SEPARATOR = /\s+\|\s+/;
// the time stamp and the blanks after it
const TIME_COLUMN_WIDTH = 9;

/**
 * `HH:MM:SS  pid cmd... val | pid cmd... val | ...`. Records with fewer than
 * three tokens or a non-numeric pid (the column header line) are skipped; a
 * value with no digits left counts as 0.
 */
export function parseTopLine(line: string): ProcessEntry[] {
  if (!TOP_LINE.test(line)) return [];

  const hour = line.slice(0, 2);
  const entries: ProcessEntry[] = [];

  for (const record of line.slice(TIME_COLUMN_WIDTH).split(RECORD_SEPARATOR)) {
    const tokens = record.trim().split(/[ \t]+/);
    if (tokens.length < 3) continue;

    const pid = tokens[0];
    if (!PID.test(pid)) continue;
    const rawValue = tokens[tokens.length - 1].replace(/[^0-9.]/g, '');
    const value = rawValue === '' ? 0 : parseFloat(rawValue);
    entries.push({
      hour,
      pid,
      command: tokens.slice(1, -1).join(' '),
      value: Number.isNaN(value) ? 0 : value
    });
  }

  return entries;
}

export function parseTopOutput(text: string): ProcessEntry[] {
  return text.split('\n').flatMap(parseTopLine);
}
