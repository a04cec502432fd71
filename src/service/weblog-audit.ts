// weblog-audit.ts - Error and latency audit over web server access logs
import { AnalyzerLogger } from '../common/logger';
import { AnalyzerConfig } from '../config/config';
import { writeRollingSummary } from '../report/audit-artifacts';
import { parseAccessLine } from '../weblog/access-log-parser';
import { dayRange, DayRange, WebLogAggregator } from '../weblog/error-aggregator';
import { findWebLogs, readLogLines } from '../weblog/log-source';
import { describeRange, renderWebLogReport, renderWebLogSummary } from '../weblog/weblog-report';
import { LineWriter } from './sar-audit';

export const WEBLOG_SUMMARY_FILE = 'weblog_summary.log';

export interface WebLogAuditDeps {
  logger: AnalyzerLogger;
  write: LineWriter;
  findLogs?: () => string[];
  readLines?: (file: string) => string[] | null;
  now?: () => Date;
}

export interface WebLogAuditResult {
  logs: string[];
  range: DayRange;
  aggregator: WebLogAggregator;
  summaryPath: string | null;
}

export async function runWebLogAudit(config: AnalyzerConfig, deps: WebLogAuditDeps): Promise<WebLogAuditResult> {
  const { logger, write } = deps;
  const weblog = config.weblog;
  const now = deps.now ?? (() => new Date());
  const readLines = deps.readLines ?? ((file: string) => readLogLines(file, logger));

  const logs = deps.findLogs ? deps.findLogs() : findWebLogs(weblog.logDir, logger);
  const range = dayRange(now(), weblog.days);
  const aggregator = new WebLogAggregator(range, weblog.window);
  logger.info('Starting web log audit', { logs: logs.length, from: range.from, to: range.to });

  if (logs.length === 0) {
    write(`No web server logs found under ${weblog.logDir}.`);
    return { logs, range, aggregator, summaryPath: null };
  }

  let unparsed = 0;
  for (const log of logs) {
    const lines = readLines(log);
    if (lines === null) continue;
    for (const line of lines) {
      const entry = parseAccessLine(line);
      if (entry === null) {
        unparsed++;
        continue;
      }
      aggregator.add(entry);
    }
  }
  if (unparsed > 0) logger.debug('Lines without a time stamp skipped', { unparsed });
  if (aggregator.linesInWindow === 0) {
    logger.warn('No log lines in the requested window', { window: describeRange(range, weblog.window) });
  }

  renderWebLogReport(aggregator, range, weblog.window, weblog.eventLimit).forEach(line => write(line));

  let summaryPath: string | null = null;
  try {
    const body = renderWebLogSummary(aggregator).join('\n') + '\n';
    summaryPath = writeRollingSummary(config.output.auditDir, WEBLOG_SUMMARY_FILE, 'weblog', body, now());
    logger.info('Wrote short summary', { path: summaryPath });
  } catch (error) {
    logger.warn('Could not write short summary', { auditDir: config.output.auditDir }, error);
  }

  return { logs, range, aggregator, summaryPath };
}
