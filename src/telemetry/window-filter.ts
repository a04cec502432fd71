// window-filter.ts - Restrict decoded rows to a [start, end) time-of-day window
import { ConfigurationError } from '../common/errors';
import { DecodedTable, TimeWindow } from '../types';
import { cell } from './decoded-table';

const TIME_INPUT = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const TIME_OF_DAY = /\b(\d{2}:\d{2}:\d{2})\b/;

export const FULL_DAY: TimeWindow = Object.freeze({ start: '00:00:00', end: '00:00:00' });

function normalizeTime(label: string, raw: string, issues: string[]): string | null {
  const match = TIME_INPUT.exec(raw.trim());
  if (!match) {
    issues.push(`${label}="${raw}" is not a time of day (HH:MM or HH:MM:SS)`);
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = Number(match[3] ?? '0');
  if (hours > 23 || minutes > 59 || seconds > 59) {
    issues.push(`${label}="${raw}" is out of range`);
    return null;
  }
  return [hours, minutes, seconds].map(v => String(v).padStart(2, '0')).join(':');
}

/**
 * Validate and zero-pad a window. A start after the end is rejected rather than
 * wrapped past midnight.
 */
export function parseWindow(start: string, end: string, labels: [string, string] = ['START', 'END']): TimeWindow {
  const issues: string[] = [];
  const s = normalizeTime(labels[0], start, issues);
  const e = normalizeTime(labels[1], end, issues);
  if (s !== null && e !== null && s > e) {
    issues.push(`${labels[0]}=${s} is after ${labels[1]}=${e}`);
  }
  if (issues.length > 0 || s === null || e === null) {
    throw new ConfigurationError(issues);
  }
  return { start: s, end: e };
}

export function isFullDay(window: TimeWindow): boolean {
  return window.start === window.end;
}

export function timeOfDay(timestamp: string): string | null {
  const match = TIME_OF_DAY.exec(timestamp);
  return match ? match[1] : null;
}

export function inWindow(window: TimeWindow, timestamp: string): boolean {
  if (isFullDay(window)) return true;
  const tod = timeOfDay(timestamp);
  if (tod === null) return false;
  return tod >= window.start && tod < window.end;
}

/**
 * Keeps the header untouched so column discovery still works when sampling
 * started outside the window.
 */
export function filterTable(table: DecodedTable, window: TimeWindow): DecodedTable {
  if (isFullDay(window)) return table;
  return {
    header: table.header,
    rows: table.rows.filter(row => inWindow(window, cell(row, 'timestamp') ?? ''))
  };
}

export function describeWindow(window: TimeWindow): string {
  return isFullDay(window) ? 'full day' : `${window.start}-${window.end}`;
}
