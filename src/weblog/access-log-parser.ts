// access-log-parser.ts - Parse web server access log lines
//
// Accepts the combined format and the variant whose bracket carries the
// upstream response time: `[05/Mar/2024:10:15:02 +0000 - 0.120] 502 "GET ..."`.

export interface AccessLogEntry {
  ip: string;
  // as logged, e.g. `05/Mar/2024:10:15:02 +0000`
  timeLocal: string;
  // `2024-03-05 10:15:02 +0000`, sortable within one zone
  timestamp: string;
  // YYYYMMDD
  day: string;
  hour: string;
  status: number | null;
  // path without the query string
  url: string | null;
  referer: string;
  userAgent: string;
  // largest value when several upstreams answered
  upstreamSeconds: number | null;
}

const MONTHS: Record<string, string> = {
  jan: '01', feb: '02', mar: '03', apr: '04', may: '05', jun: '06',
  jul: '07', aug: '08', sep: '09', oct: '10', nov: '11', dec: '12'
};

const BRACKET = /\[([^\]]+)\]/;
const TIME_LOCAL = /^(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2})(?:\s+([+-]\d{4}))?/;
const STATUS_AFTER_BRACKET = /\] (\d{3}) "/;
const STATUS_AFTER_REQUEST = /"[^"]*" (\d{3}) /;
const REQUEST_PATH = /"[^"]* (\/[^ "]+) HTTP/;
const UPSTREAM_VALUE = /^\d*\.?\d+$/;

export function isErrorStatus(status: number | null): status is number {
  return status !== null && status >= 400 && status < 600;
}

export function isServerError(status: number | null): status is number {
  return status !== null && status >= 500 && status < 600;
}

/**
 * `-` or blank is no value; `0.010, 0.250 : 1.5` gives 1.5.
 */
export function parseUpstreamTime(raw: string | undefined): number | null {
  const text = raw?.trim() ?? '';
  if (text === '' || text === '-') return null;

  let max: number | null = null;
  for (const token of text.split(/[ ,;:]+/)) {
    if (!UPSTREAM_VALUE.test(token)) continue;
    const value = parseFloat(token);
    if (max === null || value > max) max = value;
  }
  return max;
}

function statusOf(line: string): number | null {
  const match = STATUS_AFTER_BRACKET.exec(line) ?? STATUS_AFTER_REQUEST.exec(line);
  return match ? Number(match[1]) : null;
}

/**
 * Null for lines without a parseable time stamp.
 */
export function parseAccessLine(line: string): AccessLogEntry | null {
  const bracket = BRACKET.exec(line);
  if (!bracket) return null;

  const [timeLocal, upstream] = bracket[1].split(' - ');
  const time = TIME_LOCAL.exec(timeLocal.trim());
  if (!time) return null;
  const month = MONTHS[time[2].toLowerCase()];
  if (month === undefined) return null;

  const [, dd, , yyyy, hh, mm, ss, zone] = time;
  const request = REQUEST_PATH.exec(line);
  const quoted = line.split('"');
  const referer = quoted[3] ?? '';
  const userAgent = quoted[5] ?? '';

  return {
    ip: /^\S+/.exec(line)?.[0] ?? '-',
    timeLocal: timeLocal.trim(),
    timestamp: `${yyyy}-${month}-${dd} ${hh}:${mm}:${ss}${zone ? ` ${zone}` : ''}`,
    day: `${yyyy}${month}${dd}`,
    hour: hh,
    status: statusOf(line),
    url: request ? request[1].replace(/\?.*$/, '') : null,
    referer: referer === '' || referer === '-' ? '(direct)' : referer,
    userAgent: userAgent === '' ? '-' : userAgent,
    upstreamSeconds: parseUpstreamTime(upstream)
  };
}
