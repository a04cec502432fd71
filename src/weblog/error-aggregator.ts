// error-aggregator.ts - Windowed counts of error responses and upstream latency per URL
import { percentile } from '../analysis/statistics';
import { TopList } from '../analysis/top-list';
import { inWindow } from '../telemetry/window-filter';
import { TimeWindow } from '../types';
import { AccessLogEntry, isErrorStatus, isServerError } from './access-log-parser';

export const SLOW_REQUEST_ROWS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// DAY RANGE
// ============================================

export interface DayRange {
  // YYYYMMDD, both inclusive
  from: string;
  to: string;
}

function ymd(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/**
 * From `days` days before `now` through `now`, in UTC.
 */
export function dayRange(now: Date, days: number): DayRange {
  return { from: ymd(new Date(now.getTime() - days * DAY_MS)), to: ymd(now) };
}

// ============================================
// COUNT TABLE
// ============================================

export interface RankedCount {
  key: string;
  count: number;
}

export class CountTable {
  private counts: Map<string, number> = new Map();

  public add(key: string): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }

  /**
   * Count descending, then key ascending.
   */
  public top(limit: number): RankedCount[] {
    return Array.from(this.counts, ([key, count]) => ({ key, count }))
      .sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
      .slice(0, limit);
  }
}

// ============================================
// LATENCY
// ============================================

export interface UrlLatency {
  url: string;
  count: number;
  avg: number;
  max: number;
}

export interface ServerErrorSpan {
  key: string;
  count: number;
  first: string;
  last: string;
}

export interface LatencyPercentiles {
  p50: number;
  p95: number;
  p99: number;
  n: number;
}

export function latencyBucket(seconds: number): string {
  if (seconds >= 5) return '>=5s';
  if (seconds >= 3) return '3-5s';
  if (seconds >= 1) return '1-3s';
  if (seconds >= 0.5) return '0.5-1s';
  return '<0.5s';
}

interface LatencyTotals {
  sum: number;
  count: number;
  max: number;
}

// ============================================
// AGGREGATOR
// ============================================

export class WebLogAggregator {
  public readonly statuses = new CountTable();
  public readonly errorUrls = new CountTable();
  public readonly errorPairs = new CountTable();
  public readonly errorReferers = new CountTable();
  public readonly errorAgents = new CountTable();
  public readonly errorClients = new CountTable();
  public readonly errorsByHour = new CountTable();
  public readonly latencyBuckets = new CountTable();
  public readonly slowRequests = new TopList(SLOW_REQUEST_ROWS);

  private latencies: number[] = [];
  private latencyByUrl: Map<string, LatencyTotals> = new Map();
  private serverErrors: Map<string, ServerErrorSpan> = new Map();
  private serverErrorLog: AccessLogEntry[] = [];
  private seen = 0;
  private kept = 0;

  constructor(private range: DayRange, private window: TimeWindow) {}

  public accepts(entry: AccessLogEntry): boolean {
    return entry.day >= this.range.from && entry.day <= this.range.to && inWindow(this.window, entry.timestamp);
  }

  /**
   * Returns false for entries outside the day range or the time window.
   */
  public add(entry: AccessLogEntry): boolean {
    this.seen++;
    if (!this.accepts(entry)) return false;
    this.kept++;

    if (isErrorStatus(entry.status)) this.addError(entry, entry.status);
    if (entry.upstreamSeconds !== null) this.addLatency(entry, entry.upstreamSeconds);
    return true;
  }

  private addError(entry: AccessLogEntry, status: number): void {
    this.statuses.add(String(status));
    this.errorReferers.add(entry.referer);
    this.errorAgents.add(entry.userAgent);
    this.errorClients.add(entry.ip);
    this.errorsByHour.add(`${entry.hour}:00`);
    if (entry.url === null) return;

    this.errorUrls.add(entry.url);
    this.errorPairs.add(`${status} ${entry.url}`);

    if (!isServerError(status)) return;
    this.serverErrorLog.push(entry);
    const key = `${status} ${entry.url}`;
    const span = this.serverErrors.get(key);
    if (span === undefined) {
      this.serverErrors.set(key, { key, count: 1, first: entry.timestamp, last: entry.timestamp });
      return;
    }
    span.count++;
    if (entry.timestamp < span.first) span.first = entry.timestamp;
    if (entry.timestamp > span.last) span.last = entry.timestamp;
  }

  private addLatency(entry: AccessLogEntry, seconds: number): void {
    this.latencies.push(seconds);
    this.latencyBuckets.add(latencyBucket(seconds));
    if (entry.url === null) return;

    const totals = this.latencyByUrl.get(entry.url) ?? { sum: 0, count: 0, max: 0 };
    totals.sum += seconds;
    totals.count++;
    if (seconds > totals.max) totals.max = seconds;
    this.latencyByUrl.set(entry.url, totals);

    this.slowRequests.offer({
      score: seconds,
      timestamp: entry.timestamp,
      description:
        `${entry.status ?? '-'} ${entry.url} | ref=${entry.referer} | ua=${entry.userAgent} | ip=${entry.ip}`
    });
  }

  public get linesSeen(): number {
    return this.seen;
  }

  public get linesInWindow(): number {
    return this.kept;
  }

  public latencyPercentiles(): LatencyPercentiles | null {
    const p50 = percentile(this.latencies, 0.5);
    const p95 = percentile(this.latencies, 0.95);
    const p99 = percentile(this.latencies, 0.99);
    if (p50 === null || p95 === null || p99 === null) return null;
    return { p50, p95, p99, n: this.latencies.length };
  }

  /**
   * Average descending, then URL ascending.
   */
  public slowUrls(limit: number): UrlLatency[] {
    return Array.from(this.latencyByUrl, ([url, t]) => ({ url, count: t.count, avg: t.sum / t.count, max: t.max }))
      .sort((a, b) => b.avg - a.avg || (a.url < b.url ? -1 : a.url > b.url ? 1 : 0))
      .slice(0, limit);
  }

  /**
   * 5xx responses in the order they were read.
   */
  public serverErrorEvents(limit: number | null): readonly AccessLogEntry[] {
    return limit === null ? this.serverErrorLog : this.serverErrorLog.slice(0, limit);
  }

  /**
   * 5xx per `code url`, count descending, then key ascending.
   */
  public serverErrorSpans(limit: number): ServerErrorSpan[] {
    return Array.from(this.serverErrors.values())
      .sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
      .slice(0, limit);
  }
}
