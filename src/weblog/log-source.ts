// log-source.ts - Locate and read web server logs, rotated and compressed ones included
import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { AnalyzerLogger } from '../common/logger';

const WEB_LOG = /access|error|\.log/;
const GZIP_MAGIC = [0x1f, 0x8b];

/**
 * Regular files under `dir` whose name mentions access, error or .log,
 * sorted by name.
 */
export function findWebLogs(dir: string, logger: AnalyzerLogger): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch (error) {
    logger.warn('Web log directory not readable', { dir, reason: String(error) });
    return [];
  }

  return names
    .filter(name => WEB_LOG.test(name))
    .sort()
    .map(name => path.join(dir, name))
    .filter(file => {
      try {
        return fs.statSync(file).isFile();
      } catch {
        return false;
      }
    });
}

function isGzip(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === GZIP_MAGIC[0] && buffer[1] === GZIP_MAGIC[1];
}

/**
 * Lines of a plain or gzip file; null when it cannot be read or inflated.
 */
export function readLogLines(file: string, logger: AnalyzerLogger): string[] | null {
  try {
    const raw = fs.readFileSync(file);
    const text = (isGzip(raw) ? zlib.gunzipSync(raw) : raw).toString('utf8');
    return text.split('\n').filter(line => line.length > 0);
  } catch (error) {
    logger.warn('Web log unreadable, skipping', { file, reason: String(error) });
    return null;
  }
}
