// weblog-report.ts - Text layout of the web log error aggregation
import { describeWindow } from '../telemetry/window-filter';
import { TimeWindow } from '../types';
import { CountTable, DayRange, WebLogAggregator } from './error-aggregator';

export const SUMMARY_ROWS = 20;

const NO_DATA = '  (no data)';

function countRows(table: CountTable, limit: number): string[] {
  const rows = table.top(limit);
  if (rows.length === 0) return [NO_DATA];
  return rows.map(r => `${String(r.count).padStart(7)} ${r.key}`);
}

function section(title: string, body: string[]): string[] {
  return ['', `==== ${title} ====`, ...body];
}

export function describeRange(range: DayRange, window: TimeWindow): string {
  return `${range.from}..${range.to}, ${describeWindow(window)}`;
}

export function renderWebLogReport(
  aggregator: WebLogAggregator,
  range: DayRange,
  window: TimeWindow,
  eventLimit: number | null
): string[] {
  const lines = [
    `Web log window: ${describeRange(range, window)}`,
    `Lines read: ${aggregator.linesSeen}, in window: ${aggregator.linesInWindow}`
  ];

  lines.push(...section('Errors summary (HTTP 4xx/5xx, top 30)', countRows(aggregator.statuses, 30)));
  lines.push(...section('Top error URLs (no query, 4xx/5xx, top 50)', countRows(aggregator.errorUrls, 50)));
  lines.push(...section('Error pairs (code -> URL, top 50)', countRows(aggregator.errorPairs, 50)));
  lines.push(...section('Top Referers on errors (top 30)', countRows(aggregator.errorReferers, 30)));
  lines.push(...section('Top User-Agents on errors (top 30)', countRows(aggregator.errorAgents, 30)));
  lines.push(...section('Top client IPs on errors (top 30)', countRows(aggregator.errorClients, 30)));
  lines.push(...section('Errors by hour (all days combined, top 24)', countRows(aggregator.errorsByHour, 24)));

  const p = aggregator.latencyPercentiles();
  lines.push(...section('URT percentiles (p50/p95/p99)', [
    p === null
      ? NO_DATA
      : `  p50=${p.p50.toFixed(3)}s  p95=${p.p95.toFixed(3)}s  p99=${p.p99.toFixed(3)}s  (n=${p.n})`
  ]));
  lines.push(...section('URT buckets', countRows(aggregator.latencyBuckets, 5)));

  const slow = aggregator.slowUrls(20);
  lines.push(...section('Slow URLs (avg/max/req) top 20', slow.length === 0
    ? [NO_DATA]
    : slow.map(u => `  ${u.avg.toFixed(3)}s avg | ${u.max.toFixed(3)}s max | ${String(u.count).padStart(6)} req | ${u.url}`)));

  const requests = aggregator.slowRequests.entries();
  lines.push(...section(`Top single slow requests (URT desc, top ${aggregator.slowRequests.capacity})`, requests.length === 0
    ? [NO_DATA]
    : requests.map(r => `  ${r.score.toFixed(3)} ${r.timestamp} ${r.description}`)));

  const spans = aggregator.serverErrorSpans(50);
  lines.push(...section('5xx by URL (count + first/last)', spans.length === 0
    ? [NO_DATA]
    : spans.map(s => `  ${s.key} | ${String(s.count).padStart(6)} | first=${s.first} | last=${s.last}`)));

  const events = aggregator.serverErrorEvents(eventLimit);
  lines.push(...section('5xx full event stream (timestamp, code, URL, IP, Referer, UA)', events.length === 0
    ? [NO_DATA]
    : events.map(e => `  ${e.timeLocal} ${e.status ?? '-'} ${e.url ?? '-'} | ip=${e.ip} | ref=${e.referer} | ua=${e.userAgent}`)));

  return lines;
}

/**
 * The short form kept in the audit directory.
 */
export function renderWebLogSummary(aggregator: WebLogAggregator): string[] {
  return [
    '==== Errors summary (top) ====',
    ...countRows(aggregator.statuses, SUMMARY_ROWS),
    '',
    `==== Top error URLs (top ${SUMMARY_ROWS}) ====`,
    ...countRows(aggregator.errorUrls, SUMMARY_ROWS)
  ];
}
