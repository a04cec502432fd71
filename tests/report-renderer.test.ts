import { SarAnalyzer } from '../src/analysis/sar-analyzer';
import { TopList } from '../src/analysis/top-list';
import { defaultConfig } from '../src/config/config';
import {
  formatCandidate,
  num,
  renderFile,
  renderInventory,
  renderNoFiles,
  renderRankings,
  renderReport,
  renderTopBlock,
  RULE
} from '../src/report/report-renderer';
import { createMockLogger } from './helpers/mock-logger';
import { FixtureTelemetrySource } from './helpers/fixture-source';
import { NET_ZERO_IFUTIL, SA05, scenarioSource } from './helpers/sar-fixtures';

const mockLogger = createMockLogger();

async function analyze(source: FixtureTelemetrySource, config = defaultConfig()) {
  return new SarAnalyzer(mockLogger, config, source).analyzeAll([SA05]);
}

describe('renderFile', () => {
  it('lays out every section of a file', async () => {
    const analysis = await analyze(scenarioSource());
    expect(renderFile(analysis.files[0])).toEqual([
      '=== File: /var/log/sa/sa05 ===',
      '-- CPU',
      '  avg busy(usr+sys)=78.3%  iowait=0.0%  steal=0.0%  idle=21.7%',
      '  avg runq-sz=n/a  load(1/5/15)=n/a/n/a/n/a  cswch/s=n/a',
      '  p95/p99 busy=95.0/95.0%  p95/p99 iowait=0.0/0.0%',
      '',
      '-- Memory/Swap',
      '  (no data for sar -r in window)',
      '',
      '-- Disks',
      '  Average latency/utilization (top 5 by await):',
      `   - ${'sda'.padEnd(20)} avg await=28.3ms  %util=10.0  aqu=0.50`,
      '  [!] sda avg await=28.3ms (>20ms)',
      '',
      '-- Network',
      '  (no data for sar -n DEV in window)',
      '  (no data for sar -n EDEV in window)',
      '',
      '-- Sockets/TCP/IP',
      '  (no data for sar -n SOCK in window)',
      '  (no data for sar -n TCP in window)',
      '  (no data for sar -n IP in window)',
      '',
      RULE,
      ''
    ]);
  });

  it('marks estimated utilization and prints load percentiles', async () => {
    const source = new FixtureTelemetrySource().set(SA05, 'net-dev', NET_ZERO_IFUTIL);
    const analysis = await analyze(source, defaultConfig({ linkSpeedsMbps: new Map([['eth0', 10]]) }));
    const lines = renderFile(analysis.files[0]);

    const start = lines.indexOf('-- Network');
    expect(lines.slice(start, start + 5)).toEqual([
      '-- Network',
      '  Averages per interface:',
      `   - ${'eth0'.padEnd(12)} rx=500.0kB/s  tx=500.0kB/s  %ifutil≈81.9`,
      '     p95/p99 load(rx+tx)=1000.0/1000.0 kB/s',
      '  (no data for sar -n EDEV in window)'
    ]);
  });

  it('prints n/a utilization and the warning for an unknown link speed', async () => {
    const source = new FixtureTelemetrySource().set(SA05, 'net-dev', NET_ZERO_IFUTIL);
    const lines = renderFile((await analyze(source)).files[0]);

    expect(lines).toContain(`   - ${'eth0'.padEnd(12)} rx=500.0kB/s  tx=500.0kB/s  %ifutil=n/a`);
    expect(lines).toContain(
      '  [!] unknown link speed for interface eth0: %ifutil=0.00 in every sample; ' +
      'set IF_SPEED_Mbps_eth0=<Mbps> or IF_SPEED_Mbps="eth0=<Mbps>"'
    );
  });
});

describe('rankings', () => {
  it('formats a candidate as timestamp and description', () => {
    expect(formatCandidate({ score: 3, timestamp: '2024-03-05 08:30:00 UTC', description: 'DEV=sda' }))
      .toBe('  2024-03-05 08:30:00 UTC  DEV=sda');
  });

  it('prints (empty) for a list without entries', () => {
    expect(renderTopBlock('TCP (TOP-20)', new TopList(20))).toEqual(['TCP (TOP-20)', '  (empty)', '']);
  });

  it('prints one block per subsystem followed by the merged list', async () => {
    const analysis = await analyze(scenarioSource());
    const lines = renderRankings(analysis.ranker);

    expect(lines.slice(0, 4)).toEqual([
      'CPU (TOP-20)',
      '  2024-03-05 08:20:00 UTC  busy=80.0% iow=0.0% steal=0.0%',
      '  2024-03-05 08:30:00 UTC  busy=95.0% iow=0.0% steal=0.0%',
      ''
    ]);
    expect(lines.filter(l => l.endsWith('(TOP-20)') || l.endsWith('subsystems'))).toEqual([
      'CPU (TOP-20)',
      'Memory/Swap (TOP-20)',
      'Disks: spikes (TOP-20)',
      'Network: load (TOP-20)',
      'Network: errors/drops (TOP-20)',
      'SOCK (TOP-20)',
      'TCP (TOP-20)',
      'IP (TOP-20)',
      'Merged TOP-20 across all subsystems'
    ]);
    expect(lines.slice(-5)).toEqual([
      'Merged TOP-20 across all subsystems',
      '  2024-03-05 08:30:00 UTC  DEV=sda await=60.0ms util=10% aqu=0.50',
      '  2024-03-05 08:20:00 UTC  busy=80.0% iow=0.0% steal=0.0%',
      '  2024-03-05 08:30:00 UTC  busy=95.0% iow=0.0% steal=0.0%',
      ''
    ]);
  });
});

describe('full report', () => {
  it('opens with the window and closes with Done.', async () => {
    const analysis = await analyze(scenarioSource());
    const lines = renderReport(analysis, [{ title: 'Block devices and volumes (lsblk)', lines: ['sda disk 40G'] }]);

    expect(lines.slice(0, 3)).toEqual(['Analysis window: 08:00:00-19:00:00', RULE, '']);
    expect(lines.slice(-4)).toEqual(['Block devices and volumes (lsblk):', 'sda disk 40G', '', 'Done.']);
  });

  it('reports missing activity files', () => {
    expect(renderNoFiles({ start: '00:00:00', end: '00:00:00' })).toEqual([
      'Analysis window: full day',
      RULE,
      '',
      'No sa[NN] files found.'
    ]);
  });

  it('renders nothing for an empty inventory', () => {
    expect(renderInventory([])).toEqual([]);
  });

  it('prints n/a for missing numbers', () => {
    expect(num(null, 1)).toBe('n/a');
    expect(num(2.5, 2)).toBe('2.50');
  });
});
