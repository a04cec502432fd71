// source-reader.ts - Locate activity files and decode them through sadf
import * as fs from 'fs';
import * as path from 'path';
import { AnalyzerLogger } from '../common/logger';
import { failureReason, runTool, ToolRunner } from '../common/exec';
import { DecodedTable, ReportType, TimeWindow } from '../types';
import { parseDecodedTable } from './decoded-table';
import { isFullDay } from './window-filter';

export const SAR_ARGS: Record<ReportType, readonly string[]> = {
  'cpu': ['-u'],
  'cpu-per-core': ['-P', 'ALL', '-u'],
  'queue': ['-q'],
  'switch': ['-w'],
  'memory': ['-r'],
  'swap': ['-S'],
  'paging': ['-B'],
  'disk': ['-d'],
  'net-dev': ['-n', 'DEV'],
  'net-err': ['-n', 'EDEV'],
  'sock': ['-n', 'SOCK'],
  'tcp': ['-n', 'TCP'],
  'ip': ['-n', 'IP']
};

export function reportLabel(reportType: ReportType): string {
  return `sar ${SAR_ARGS[reportType].join(' ')}`;
}

/**
 * The only process boundary of the pipeline. `null` means the report type is
 * absent for this file (unsupported counters, corrupt file, decoder missing,
 * timeout); implementations must not throw for those.
 */
export interface TelemetrySource {
  decode(file: string, reportType: ReportType, window: TimeWindow): Promise<DecodedTable | null>;
}

export interface ActivityFile {
  path: string;
  mtimeMs: number;
}

const ACTIVITY_FILE = /^sa\d+$/;

/**
 * Up to `maxFiles` saNN files across `dirs`, most recently modified first.
 * Missing directories and unreadable entries are skipped.
 */
export async function findActivityFiles(
  dirs: readonly string[],
  maxFiles: number,
  logger: AnalyzerLogger
): Promise<ActivityFile[]> {
  const found: ActivityFile[] = [];

  for (const dir of dirs) {
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (error) {
      logger.debug('Activity log directory not readable', { dir, reason: String(error) });
      continue;
    }

    for (const name of names) {
      if (!ACTIVITY_FILE.test(name)) continue;
      const filePath = path.join(dir, name);
      try {
        const stat = await fs.promises.stat(filePath);
        if (!stat.isFile()) continue;
        await fs.promises.access(filePath, fs.constants.R_OK);
        found.push({ path: filePath, mtimeMs: stat.mtimeMs });
      } catch (error) {
        logger.debug('Skipping unreadable activity file', { file: filePath, reason: String(error) });
      }
    }
  }

  found.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
  return found.slice(0, maxFiles);
}

export interface SadfOptions {
  timeoutMs: number;
  runner?: ToolRunner;
  binary?: string;
}

export class SadfTelemetrySource implements TelemetrySource {
  private logger: AnalyzerLogger;
  private runner: ToolRunner;
  private timeoutMs: number;
  private binary: string;

  constructor(logger: AnalyzerLogger, options: SadfOptions) {
    this.logger = logger;
    this.runner = options.runner ?? runTool;
    this.timeoutMs = options.timeoutMs;
    this.binary = options.binary ?? 'sadf';
  }

  public buildArgs(file: string, reportType: ReportType, window: TimeWindow): string[] {
    const args = ['-d', '-H'];
    if (!isFullDay(window)) {
      args.push('-s', window.start, '-e', window.end);
    }
    args.push(file, '--', ...SAR_ARGS[reportType]);
    return args;
  }

  public async decode(file: string, reportType: ReportType, window: TimeWindow): Promise<DecodedTable | null> {
    const args = this.buildArgs(file, reportType, window);
    // numbers with a decimal point regardless of the host locale
    const env = { ...process.env, LC_ALL: 'C', LC_NUMERIC: 'C' };
    const result = await this.runner(this.binary, args, { timeoutMs: this.timeoutMs, env });

    if (!result.ok) {
      const context = {
        file,
        report: reportLabel(reportType),
        reason: failureReason(this.binary, result, this.timeoutMs),
        exitCode: result.code
      };
      if (result.notFound || result.timedOut) {
        this.logger.warn('Report type unavailable for file', context);
      } else {
        this.logger.debug('Report type unavailable for file', context);
      }
      return null;
    }

    const table = parseDecodedTable(result.stdout);
    if (!table) {
      this.logger.debug('Decoder produced no header', { file, report: reportLabel(reportType) });
    }
    return table;
  }
}
