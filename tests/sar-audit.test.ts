import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AnalyzerConfig, defaultConfig } from '../src/config/config';
import { ArchiveResult, ArchiveSink } from '../src/report/audit-artifacts';
import { RULE } from '../src/report/report-renderer';
import { runSarAudit } from '../src/service/sar-audit';
import { createMockLogger } from './helpers/mock-logger';
import { SA05, scenarioSource } from './helpers/sar-fixtures';

const mockLogger = createMockLogger();
const NOW = new Date('2024-03-05T20:00:00.000Z');

class RecordingSink implements ArchiveSink {
  public workDir = '';
  public files: string[] = [];
  public names: string[] = [];

  public async archive(workDir: string, archiveName: string): Promise<ArchiveResult | null> {
    this.workDir = workDir;
    this.files = fs.readdirSync(workDir).sort();
    this.names.push(archiveName);
    return { archivePath: path.join('/archive', archiveName), files: this.files.length };
  }
}

let tmpDir: string;
let config: AnalyzerConfig;

beforeEach(() => {
  jest.clearAllMocks();
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sysstat-window-audit-test-'));
  const base = defaultConfig();
  config = defaultConfig({ output: { ...base.output, auditDir: tmpDir } });
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('runSarAudit', () => {
  it('prints the report, writes the summary and archives the dumps', async () => {
    const lines: string[] = [];
    const sink = new RecordingSink();

    const result = await runSarAudit(config, {
      logger: mockLogger,
      write: line => lines.push(line),
      source: scenarioSource(),
      archive: sink,
      findFiles: async () => [{ path: SA05, mtimeMs: 1 }],
      inventory: false,
      now: () => NOW
    });

    expect(lines[0]).toBe('Analysis window: 08:00:00-19:00:00');
    expect(lines).toContain('=== File: /var/log/sa/sa05 ===');
    expect(lines[lines.length - 1]).toBe('Done.');

    expect(result.files).toEqual([SA05]);
    expect(result.summaryPath).toBe(path.join(tmpDir, 'sar_summary.log'));
    expect(fs.readFileSync(path.join(tmpDir, 'sar_summary.log'), 'utf8')).toBe(
      '# sar summary: 2024-03-05T20:00:00.000Z\n\n' +
      '3;2024-03-05 08:30:00 UTC;DEV=sda await=60.0ms util=10% aqu=0.50\n' +
      '2;2024-03-05 08:20:00 UTC;busy=80.0% iow=0.0% steal=0.0%\n' +
      '2;2024-03-05 08:30:00 UTC;busy=95.0% iow=0.0% steal=0.0%\n'
    );

    expect(sink.names).toEqual(['sar.tgz']);
    expect(sink.files).toEqual([
      'top_all.all',
      'top_cpu.all',
      'top_disk.all',
      'top_ip.all',
      'top_mem.all',
      'top_neterr.all',
      'top_netload.all',
      'top_sock.all',
      'top_tcp.all'
    ]);
    expect(result.archivePath).toBe('/archive/sar.tgz');
    expect(fs.existsSync(sink.workDir)).toBe(false);
  });

  it('reports missing files and stops', async () => {
    const lines: string[] = [];
    const sink = new RecordingSink();

    const result = await runSarAudit(config, {
      logger: mockLogger,
      write: line => lines.push(line),
      source: scenarioSource(),
      archive: sink,
      findFiles: async () => [],
      inventory: false
    });

    expect(lines).toEqual(['Analysis window: 08:00:00-19:00:00', RULE, '', 'No sa[NN] files found.']);
    expect(result).toEqual({ files: [], analysis: null, summaryPath: null, archivePath: null });
    expect(sink.names).toEqual([]);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('skips the archive when it is switched off', async () => {
    const sink = new RecordingSink();
    const noArchive = defaultConfig({ output: { ...config.output, archive: false } });

    const result = await runSarAudit(noArchive, {
      logger: mockLogger,
      write: () => undefined,
      source: scenarioSource(),
      archive: sink,
      findFiles: async () => [{ path: SA05, mtimeMs: 1 }],
      inventory: false
    });

    expect(sink.names).toEqual([]);
    expect(result.archivePath).toBeNull();
    expect(result.summaryPath).toBe(path.join(tmpDir, 'sar_summary.log'));
  });

  it('keeps the run directory when temp cleanup is off', async () => {
    const sink = new RecordingSink();
    const keep = defaultConfig({ output: { ...config.output, cleanTmp: false } });

    await runSarAudit(keep, {
      logger: mockLogger,
      write: () => undefined,
      source: scenarioSource(),
      archive: sink,
      findFiles: async () => [{ path: SA05, mtimeMs: 1 }],
      inventory: false
    });

    try {
      expect(fs.existsSync(path.join(sink.workDir, 'top_all.all'))).toBe(true);
    } finally {
      fs.rmSync(sink.workDir, { recursive: true, force: true });
    }
  });
});
