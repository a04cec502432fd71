// audit-artifacts.ts - Rolling summary, per-run candidate dumps and the archive hand-off
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as crypto from 'crypto';
import { AnalyzerLogger } from '../common/logger';
import { runTool, ToolRunner } from '../common/exec';
import { TopKRanker, TopList } from '../analysis/top-list';
import { Candidate, Subsystem, SUBSYSTEMS } from '../types';

export const DUMP_FILES: Record<Subsystem, string> = {
  cpu: 'top_cpu.all',
  memory: 'top_mem.all',
  disk: 'top_disk.all',
  netdev: 'top_netload.all',
  neterr: 'top_neterr.all',
  socket: 'top_sock.all',
  tcp: 'top_tcp.all',
  ip: 'top_ip.all'
};
export const MERGED_DUMP_FILE = 'top_all.all';

export function formatCandidateRecord(candidate: Candidate): string {
  return `${candidate.score};${candidate.timestamp};${candidate.description}`;
}

function recordsOf(list: TopList): string {
  return list.entries().map(c => formatCandidateRecord(c) + '\n').join('');
}

/**
 * Write to a temp file beside the target, then rename over it.
 */
export function atomicWriteFileSync(filePath: string, data: string, mode: number = 0o644): void {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.tmp.${crypto.randomBytes(8).toString('hex')}`);

  try {
    fs.writeFileSync(tempPath, data, { encoding: 'utf8', mode });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * `# <label> summary: <iso>` followed by the merged ranking, one
 * `score;timestamp;description` record per line.
 */
export function writeRollingSummary(
  auditDir: string,
  fileName: string,
  label: string,
  body: string,
  now: Date = new Date()
): string {
  fs.mkdirSync(auditDir, { recursive: true });
  const target = path.join(auditDir, fileName);
  atomicWriteFileSync(target, `# ${label} summary: ${now.toISOString()}\n\n${body}`);
  return target;
}

export function rankingSummaryBody(ranker: TopKRanker): string {
  return recordsOf(ranker.global());
}

export function writeCandidateDumps(dir: string, ranker: TopKRanker): string[] {
  const written: string[] = [];
  for (const subsystem of SUBSYSTEMS) {
    const target = path.join(dir, DUMP_FILES[subsystem]);
    fs.writeFileSync(target, recordsOf(ranker.list(subsystem)));
    written.push(target);
  }
  const merged = path.join(dir, MERGED_DUMP_FILE);
  fs.writeFileSync(merged, recordsOf(ranker.global()));
  written.push(merged);
  return written;
}

// ============================================
// RUN DIRECTORY
// ============================================

/**
 * Process-private working directory, removed when `fn` settles unless
 * `keep` is set.
 */
export async function withRunDirectory<T>(
  prefix: string,
  keep: boolean,
  logger: AnalyzerLogger,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    if (keep) {
      logger.info('Keeping run directory', { dir });
    } else {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }
}

// ============================================
// ARCHIVE HAND-OFF
// ============================================

export interface ArchiveResult {
  archivePath: string;
  files: number;
}

export interface ArchiveSink {
  archive(workDir: string, archiveName: string): Promise<ArchiveResult | null>;
}

export class TarArchiveSink implements ArchiveSink {
  private logger: AnalyzerLogger;
  private auditDir: string;
  private runner: ToolRunner;

  constructor(logger: AnalyzerLogger, auditDir: string, runner: ToolRunner = runTool) {
    this.logger = logger;
    this.auditDir = auditDir;
    this.runner = runner;
  }

  public async archive(workDir: string, archiveName: string): Promise<ArchiveResult | null> {
    const files = fs.readdirSync(workDir).filter(name => fs.statSync(path.join(workDir, name)).isFile());
    if (files.length === 0) {
      this.logger.info('No files to archive', { workDir });
      return null;
    }

    fs.mkdirSync(this.auditDir, { recursive: true });
    const archivePath = path.join(this.auditDir, archiveName);
    const result = await this.runner('tar', ['-czf', archivePath, '-C', workDir, '.'], { timeoutMs: 60000 });
    if (!result.ok) {
      this.logger.warn('Archive creation failed', { archivePath, reason: result.stderr.trim() });
      return null;
    }

    this.logger.info('Archive written', { archivePath, files: files.length });
    return { archivePath, files: files.length };
  }
}
