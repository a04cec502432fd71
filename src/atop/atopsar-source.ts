// atopsar-source.ts - Locate atop raw logs and pull top-process listings through atopsar
import * as fs from 'fs';
import * as path from 'path';
import { AnalyzerLogger } from '../common/logger';
import { failureReason, runTool, ToolRunner } from '../common/exec';
import { TimeWindow } from '../types';
import { isFullDay } from '../telemetry/window-filter';
import { AtopMetric } from './atopsar-parser';

export const ATOPSAR_FLAGS: Record<AtopMetric, string> = {
  cpu: '-O',
  mem: '-G',
  dsk: '-D',
  net: '-N'
};

const ATOP_LOG = /^atop_/;

function isReadableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) return false;
    fs.accessSync(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Day label of a log: `atop_20240105` gives `20240105`.
 */
export function dayLabel(filePath: string): string {
  const base = path.basename(filePath);
  return base.replace(ATOP_LOG, '') || base;
}

/**
 * `explicitFile` alone when given and readable; otherwise every atop_* file in
 * `logPath`, or in `fallbackDir` when `logPath` is not a directory.
 */
export function findAtopLogs(
  logPath: string,
  explicitFile: string | null,
  logger: AnalyzerLogger,
  fallbackDir: string = process.cwd()
): string[] {
  if (explicitFile !== null) {
    if (isReadableFile(explicitFile)) return [explicitFile];
    logger.warn('Supplied atop file is not readable, skipping', { file: explicitFile });
    return [];
  }

  let dir = logPath;
  if (!fs.existsSync(logPath) || !fs.statSync(logPath).isDirectory()) {
    logger.warn('atop log directory not found, using the current directory', { logPath, fallbackDir });
    dir = fallbackDir;
  }

  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch (error) {
    logger.debug('atop log directory not readable', { dir, reason: String(error) });
    return [];
  }

  return names
    .filter(name => ATOP_LOG.test(name))
    .sort()
    .map(name => path.join(dir, name))
    .filter(isReadableFile);
}

export interface AtopsarOptions {
  timeoutMs: number;
  runner?: ToolRunner;
  binary?: string;
}

export interface ProcessTopSource {
  topListing(file: string, metric: AtopMetric, window: TimeWindow): Promise<string | null>;
}

export class AtopsarSource implements ProcessTopSource {
  private logger: AnalyzerLogger;
  private runner: ToolRunner;
  private timeoutMs: number;
  private binary: string;

  constructor(logger: AnalyzerLogger, options: AtopsarOptions) {
    this.logger = logger;
    this.runner = options.runner ?? runTool;
    this.timeoutMs = options.timeoutMs;
    this.binary = options.binary ?? 'atopsar';
  }

  public buildArgs(file: string, metric: AtopMetric, window: TimeWindow): string[] {
    const args = [ATOPSAR_FLAGS[metric], '-S', '-r', file];
    if (!isFullDay(window)) {
      args.push('-b', window.start.slice(0, 5), '-e', window.end.slice(0, 5));
    }
    return args;
  }

  public async topListing(file: string, metric: AtopMetric, window: TimeWindow): Promise<string | null> {
    const args = this.buildArgs(file, metric, window);
    const env = { ...process.env, LC_ALL: 'C' };
    const result = await this.runner(this.binary, args, { timeoutMs: this.timeoutMs, env });

    if (!result.ok) {
      const reason = failureReason(this.binary, result, this.timeoutMs);
      this.logger.warn('atopsar listing unavailable', { file, metric, reason });
      return null;
    }
    return result.stdout;
  }
}
