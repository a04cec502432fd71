// atop-audit.ts - Process-top audit over atop raw logs
import * as fs from 'fs';
import * as path from 'path';
import { AnalyzerLogger } from '../common/logger';
import { describeError } from '../common/errors';
import { runTool, ToolRunner } from '../common/exec';
import { AnalyzerConfig } from '../config/config';
import { ATOP_METRICS, AtopMetric, parseTopOutput } from '../atop/atopsar-parser';
import { ProcessTopAggregator } from '../atop/process-aggregator';
import { AtopsarSource, dayLabel, findAtopLogs, ProcessTopSource } from '../atop/atopsar-source';
import { renderAtopSummary, renderTopTables } from '../atop/atop-report';
import { ArchiveSink, TarArchiveSink, withRunDirectory, writeRollingSummary } from '../report/audit-artifacts';
import { LineWriter } from './sar-audit';

export const ATOP_SUMMARY_FILE = 'atop_summary.log';
export const ATOP_ARCHIVE_NAME = 'atop.tgz';

export interface AtopAuditDeps {
  logger: AnalyzerLogger;
  write: LineWriter;
  source?: ProcessTopSource;
  archive?: ArchiveSink;
  runner?: ToolRunner;
  findLogs?: () => string[];
  now?: () => Date;
}

export interface RawListing {
  day: string;
  metric: AtopMetric;
  text: string;
}

export interface AtopAuditResult {
  logs: string[];
  aggregator: ProcessTopAggregator;
  summaryPath: string | null;
  archivePath: string | null;
}

export function rawListingName(listing: RawListing): string {
  return `RAW_TOP_${listing.day}_${listing.metric.toUpperCase()}.txt`;
}

export async function runAtopAudit(config: AnalyzerConfig, deps: AtopAuditDeps): Promise<AtopAuditResult> {
  const { logger, write } = deps;
  const atop = config.atop;
  const runner = deps.runner ?? runTool;
  const now = deps.now ?? (() => new Date());

  const logs = deps.findLogs ? deps.findLogs() : findAtopLogs(atop.logPath, atop.file, logger);
  logger.info('Starting atop process-top audit', { logs: logs.length, topN: atop.topN });

  const source = deps.source ?? new AtopsarSource(logger, {
    timeoutMs: config.sources.decoderTimeoutMs,
    runner
  });
  const aggregator = new ProcessTopAggregator(atop.topN);
  const listings: RawListing[] = [];

  for (const log of logs) {
    const day = dayLabel(log);
    logger.info('Processing atop day', { day, file: log });
    for (const metric of ATOP_METRICS) {
      const text = await source.topListing(log, metric, atop.window);
      if (text === null) continue;
      listings.push({ day, metric, text });
      aggregator.addAll(metric, parseTopOutput(text));
    }
  }

  for (const metric of ATOP_METRICS) {
    if (aggregator.hours(metric).length === 0) {
      logger.warn('No process-top data for metric', { metric });
    }
  }

  if (logs.length === 0) write('No atop_* logs found.');
  const summary = renderAtopSummary(aggregator, atop);
  [...renderTopTables(aggregator, atop.window), ...summary].forEach(line => write(line));

  let summaryPath: string | null = null;
  try {
    summaryPath = writeRollingSummary(config.output.auditDir, ATOP_SUMMARY_FILE, 'atop', summary.join('\n') + '\n', now());
    logger.info('Wrote short summary', { path: summaryPath });
  } catch (error) {
    logger.warn('Could not write short summary', { auditDir: config.output.auditDir }, error);
  }

  let archivePath: string | null = null;
  if (config.output.archive && listings.length > 0) {
    const sink = deps.archive ?? new TarArchiveSink(logger, config.output.auditDir, runner);
    try {
      archivePath = await withRunDirectory('atop-an-', !config.output.cleanTmp, logger, async dir => {
        for (const listing of listings) {
          fs.writeFileSync(path.join(dir, rawListingName(listing)), listing.text);
        }
        const archived = await sink.archive(dir, ATOP_ARCHIVE_NAME);
        return archived ? archived.archivePath : null;
      });
    } catch (error) {
      logger.warn('Archive hand-off failed', { reason: describeError(error) });
    }
  }

  return { logs, aggregator, summaryPath, archivePath };
}
