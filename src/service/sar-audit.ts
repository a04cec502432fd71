// sar-audit.ts - End-to-end sysstat window audit: find files, analyze, print, hand off artifacts
import { AnalyzerLogger } from '../common/logger';
import { describeError } from '../common/errors';
import { runTool, ToolRunner } from '../common/exec';
import { AnalyzerConfig } from '../config/config';
import { SarAnalysis, SarAnalyzer } from '../analysis/sar-analyzer';
import {
  ActivityFile,
  findActivityFiles,
  SadfTelemetrySource,
  TelemetrySource
} from '../telemetry/source-reader';
import { describeWindow } from '../telemetry/window-filter';
import { renderNoFiles, renderReport } from '../report/report-renderer';
import { collectHardwareInventory } from '../report/hardware-inventory';
import {
  ArchiveSink,
  rankingSummaryBody,
  TarArchiveSink,
  withRunDirectory,
  writeCandidateDumps,
  writeRollingSummary
} from '../report/audit-artifacts';

export const SAR_SUMMARY_FILE = 'sar_summary.log';
export const SAR_ARCHIVE_NAME = 'sar.tgz';

export type LineWriter = (line: string) => void;

export interface SarAuditDeps {
  logger: AnalyzerLogger;
  write: LineWriter;
  source?: TelemetrySource;
  archive?: ArchiveSink;
  runner?: ToolRunner;
  findFiles?: (dirs: readonly string[], maxFiles: number) => Promise<ActivityFile[]>;
  inventory?: boolean;
  now?: () => Date;
}

export interface SarAuditResult {
  files: string[];
  analysis: SarAnalysis | null;
  summaryPath: string | null;
  archivePath: string | null;
}

export async function runSarAudit(config: AnalyzerConfig, deps: SarAuditDeps): Promise<SarAuditResult> {
  const { logger, write } = deps;
  const runner = deps.runner ?? runTool;
  const now = deps.now ?? (() => new Date());

  logger.info('Starting sysstat window audit', {
    window: describeWindow(config.window),
    maxFiles: config.maxFiles,
    topN: config.topN
  });

  const find = deps.findFiles ?? ((dirs, max) => findActivityFiles(dirs, max, logger));
  const files = (await find(config.sources.saDirs, config.maxFiles)).map(f => f.path);

  if (files.length === 0) {
    logger.warn('No activity files found', { dirs: config.sources.saDirs });
    renderNoFiles(config.window).forEach(line => write(line));
    return { files, analysis: null, summaryPath: null, archivePath: null };
  }
  logger.debug('Files to analyze (newest first)', { files });

  const source = deps.source ?? new SadfTelemetrySource(logger, {
    timeoutMs: config.sources.decoderTimeoutMs,
    runner
  });
  const analyzer = new SarAnalyzer(logger, config, source);
  const analysis = await analyzer.analyzeAll(files);

  const inventory = deps.inventory === false ? [] : await collectHardwareInventory(runner, logger);
  renderReport(analysis, inventory).forEach(line => write(line));

  let summaryPath: string | null = null;
  try {
    summaryPath = writeRollingSummary(
      config.output.auditDir,
      SAR_SUMMARY_FILE,
      'sar',
      rankingSummaryBody(analysis.ranker),
      now()
    );
    logger.info('Wrote short summary', { path: summaryPath });
  } catch (error) {
    logger.warn('Could not write short summary', { auditDir: config.output.auditDir }, error);
  }

  let archivePath: string | null = null;
  if (config.output.archive) {
    const sink = deps.archive ?? new TarArchiveSink(logger, config.output.auditDir, runner);
    try {
      archivePath = await withRunDirectory('sar-an-', !config.output.cleanTmp, logger, async dir => {
        writeCandidateDumps(dir, analysis.ranker);
        const archived = await sink.archive(dir, SAR_ARCHIVE_NAME);
        return archived ? archived.archivePath : null;
      });
    } catch (error) {
      logger.warn('Archive hand-off failed', { reason: describeError(error) });
    }
  }

  logger.info('Sysstat window audit finished', {
    files: files.length,
    candidates: analysis.ranker.offeredCount
  });
  return { files, analysis, summaryPath, archivePath };
}
