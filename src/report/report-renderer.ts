// report-renderer.ts - Text layout of the window report
import {
  ColumnAverages,
  CpuSection,
  DiskSection,
  FileReport,
  MemorySection,
  NetworkSection,
  NoData,
  SarAnalysis
} from '../analysis/sar-analyzer';
import { TopKRanker, TopList } from '../analysis/top-list';
import { Candidate, Subsystem, SUBSYSTEMS, TimeWindow } from '../types';
import { describeWindow } from '../telemetry/window-filter';

export const RULE = '-'.repeat(80);
const DISK_ROWS = 5;

export const SUBSYSTEM_TITLES: Record<Subsystem, string> = {
  cpu: 'CPU',
  memory: 'Memory/Swap',
  disk: 'Disks: spikes',
  netdev: 'Network: load',
  neterr: 'Network: errors/drops',
  socket: 'SOCK',
  tcp: 'TCP',
  ip: 'IP'
};

export interface InventorySection {
  title: string;
  lines: string[];
}

export function num(value: number | null, digits: number): string {
  return value === null ? 'n/a' : value.toFixed(digits);
}

export function noDataLine(section: NoData): string {
  return `  (no data for ${section.report} in window)`;
}

// ============================================
// PER-FILE SECTIONS
// ============================================

export function renderHeader(window: TimeWindow): string[] {
  return [`Analysis window: ${describeWindow(window)}`, RULE, ''];
}

function renderCpu(section: CpuSection | NoData): string[] {
  const lines = ['-- CPU'];
  if (section.status === 'no-data') return [...lines, noDataLine(section), ''];

  lines.push(
    `  avg busy(usr+sys)=${num(section.avgBusy, 1)}%  iowait=${num(section.avgIowait, 1)}%` +
    `  steal=${num(section.avgSteal, 1)}%  idle=${num(section.avgIdle, 1)}%`
  );
  const rq = section.runQueue;
  lines.push(
    `  avg runq-sz=${num(rq ? rq.runq : null, 2)}  load(1/5/15)=` +
    `${num(rq ? rq.load1 : null, 2)}/${num(rq ? rq.load5 : null, 2)}/${num(rq ? rq.load15 : null, 2)}` +
    `  cswch/s=${num(section.avgCswch, 0)}`
  );
  lines.push(
    `  p95/p99 busy=${num(section.p95Busy, 1)}/${num(section.p99Busy, 1)}%` +
    `  p95/p99 iowait=${num(section.p95Iowait, 1)}/${num(section.p99Iowait, 1)}%`
  );
  if (section.perCore && section.perCore.length > 0) {
    lines.push(`  per-core avg busy: ${section.perCore.map(c => `cpu${c.cpu}=${num(c.avgBusy, 1)}%`).join(' ')}`);
  }
  for (const warning of section.warnings) lines.push(`  [!] ${warning}`);
  lines.push('');
  return lines;
}

function renderMemory(section: MemorySection | NoData): string[] {
  const lines = ['-- Memory/Swap'];
  if (section.status === 'no-data') return [...lines, noDataLine(section), ''];

  lines.push(`  avg %memused=${num(section.avgMemused, 1)}%  kbavail=${num(section.avgKbavail, 0)}`);
  lines.push(
    `  p95/p99 %memused=${num(section.p95Memused, 1)}/${num(section.p99Memused, 1)}%` +
    `  (kbavail p5/p1=${num(section.p5Kbavail, 0)}/${num(section.p1Kbavail, 0)})`
  );
  if (section.avgSwpused !== null) {
    lines.push(`  avg %swpused=${num(section.avgSwpused, 1)}%`);
  }
  for (const warning of section.warnings) lines.push(`  [!] ${warning}`);
  lines.push('');
  return lines;
}

function renderDisk(section: DiskSection | NoData): string[] {
  const lines = ['-- Disks'];
  if (section.status === 'no-data') return [...lines, noDataLine(section), ''];

  lines.push(`  Average latency/utilization (top ${DISK_ROWS} by await):`);
  for (const d of section.devices.slice(0, DISK_ROWS)) {
    lines.push(`   - ${d.device.padEnd(20)} avg await=${d.await.toFixed(1)}ms  %util=${d.util.toFixed(1)}  aqu=${d.aqu.toFixed(2)}`);
  }
  for (const warning of section.warnings) lines.push(`  [!] ${warning}`);
  lines.push('');
  return lines;
}

function renderNetwork(section: NetworkSection | NoData, errors: ColumnAverages | NoData): string[] {
  const lines = ['-- Network'];
  if (section.status === 'no-data') {
    lines.push(noDataLine(section));
  } else {
    lines.push('  Averages per interface:');
    for (const i of section.interfaces) {
      const util = i.utilization === 'estimated' ? `≈${num(i.avgIfutil, 1)}` : `=${num(i.avgIfutil, 1)}`;
      lines.push(`   - ${i.iface.padEnd(12)} rx=${num(i.avgRx, 1)}kB/s  tx=${num(i.avgTx, 1)}kB/s  %ifutil${util}`);
      lines.push(`     p95/p99 load(rx+tx)=${num(i.p95Load, 1)}/${num(i.p99Load, 1)} kB/s`);
    }
    for (const warning of section.warnings) lines.push(`  [!] ${warning}`);
  }
  if (errors.status === 'no-data') lines.push(noDataLine(errors));
  lines.push('');
  return lines;
}

function renderAverages(section: ColumnAverages | NoData): string {
  if (section.status === 'no-data') return noDataLine(section);
  const values = section.averages.map(a => `${a.column}=${num(a.value, 1)}`).join('  ');
  return `  ${section.report}: avg ${values || '(no known columns)'}`;
}

function renderProtocols(report: FileReport): string[] {
  return [
    '-- Sockets/TCP/IP',
    renderAverages(report.sockets),
    renderAverages(report.tcp),
    renderAverages(report.ip),
    ''
  ];
}

export function renderFile(report: FileReport): string[] {
  return [
    `=== File: ${report.file} ===`,
    ...renderCpu(report.cpu),
    ...renderMemory(report.memory),
    ...renderDisk(report.disk),
    ...renderNetwork(report.network, report.netErrors),
    ...renderProtocols(report),
    RULE,
    ''
  ];
}

// ============================================
// RANKINGS
// ============================================

export function formatCandidate(candidate: Candidate): string {
  return `  ${candidate.timestamp}  ${candidate.description}`;
}

export function renderTopBlock(title: string, list: TopList): string[] {
  const lines = [title];
  if (list.isEmpty()) {
    lines.push('  (empty)');
  } else {
    for (const candidate of list.entries()) lines.push(formatCandidate(candidate));
  }
  lines.push('');
  return lines;
}

export function renderRankings(ranker: TopKRanker): string[] {
  const lines: string[] = [];
  for (const subsystem of SUBSYSTEMS) {
    lines.push(...renderTopBlock(`${SUBSYSTEM_TITLES[subsystem]} (TOP-${ranker.capacity})`, ranker.list(subsystem)));
  }
  lines.push(...renderTopBlock(`Merged TOP-${ranker.capacity} across all subsystems`, ranker.global()));
  return lines;
}

export function renderInventory(sections: InventorySection[]): string[] {
  const lines: string[] = [];
  for (const section of sections) {
    lines.push(`${section.title}:`, ...section.lines, '');
  }
  return lines;
}

// ============================================
// FULL REPORT
// ============================================

export function renderNoFiles(window: TimeWindow): string[] {
  return [...renderHeader(window), 'No sa[NN] files found.'];
}

export function renderReport(analysis: SarAnalysis, inventory: InventorySection[] = []): string[] {
  return [
    ...renderHeader(analysis.window),
    ...analysis.files.flatMap(renderFile),
    ...renderRankings(analysis.ranker),
    ...renderInventory(inventory),
    'Done.'
  ];
}
