// sar-analyzer.ts - One analysis run: decode, window, extract, score and rank every file
import { AnalyzerLogger } from '../common/logger';
import { AnalyzerConfig } from '../config/config';
import { ReportType, Sample, Subsystem, TimeWindow } from '../types';
import { reportLabel, TelemetrySource } from '../telemetry/source-reader';
import { filterTable } from '../telemetry/window-filter';
import {
  aggregateCpuSamples,
  DECLARED_COLUMNS,
  extractSamples,
  fieldOr,
  groupByResource,
  interfaceLoad,
  isReportableInterface,
  pageScanRate,
  perCoreCpuSamples,
  resolveInterfaceUtilization,
  UtilizationSource
} from './metric-extractor';
import { mean, MetricSeries } from './statistics';
import {
  cpuBusy,
  DiskAverages,
  diskAverageWarnings,
  scoreCpu,
  scoreDisk,
  scoreIp,
  scoreMemory,
  scoreNetErrors,
  scoreNetLoad,
  runQueueLimit,
  scoreRunQueue,
  scoreSocket,
  scoreTcp
} from './anomaly-scorer';
import { TopKRanker } from './top-list';

// ============================================
// SECTION SHAPES
// ============================================

export interface NoData {
  status: 'no-data';
  report: string;
}

export interface RunQueueStats {
  runq: number | null;
  load1: number | null;
  load5: number | null;
  load15: number | null;
}

export interface CoreBusy {
  cpu: string;
  avgBusy: number | null;
}

export interface CpuSection {
  status: 'ok';
  avgBusy: number | null;
  avgIowait: number | null;
  avgSteal: number | null;
  avgIdle: number | null;
  runQueue: RunQueueStats | null;
  avgCswch: number | null;
  p95Busy: number | null;
  p99Busy: number | null;
  p95Iowait: number | null;
  p99Iowait: number | null;
  warnings: string[];
  perCore: CoreBusy[] | null;
}

export interface MemorySection {
  status: 'ok';
  avgMemused: number | null;
  avgKbavail: number | null;
  p95Memused: number | null;
  p99Memused: number | null;
  p5Kbavail: number | null;
  p1Kbavail: number | null;
  avgSwpused: number | null;
  warnings: string[];
}

export interface DiskSection {
  status: 'ok';
  // sorted by average await, worst first
  devices: DiskAverages[];
  warnings: string[];
}

export interface InterfaceSummary {
  iface: string;
  avgRx: number | null;
  avgTx: number | null;
  avgIfutil: number | null;
  utilization: UtilizationSource;
  p95Load: number | null;
  p99Load: number | null;
}

export interface NetworkSection {
  status: 'ok';
  interfaces: InterfaceSummary[];
  warnings: string[];
}

export interface ColumnAverages {
  status: 'ok';
  report: string;
  averages: Array<{ column: string; value: number | null }>;
}

export interface FileReport {
  file: string;
  cpu: CpuSection | NoData;
  memory: MemorySection | NoData;
  disk: DiskSection | NoData;
  network: NetworkSection | NoData;
  netErrors: ColumnAverages | NoData;
  sockets: ColumnAverages | NoData;
  tcp: ColumnAverages | NoData;
  ip: ColumnAverages | NoData;
}

export interface SarAnalysis {
  window: TimeWindow;
  files: FileReport[];
  ranker: TopKRanker;
}

function noData(reportType: ReportType): NoData {
  return { status: 'no-data', report: reportLabel(reportType) };
}

function seriesOf(samples: Sample[], pick: (s: Sample) => number): MetricSeries {
  const series = new MetricSeries();
  for (const sample of samples) series.push(pick(sample));
  return series;
}

function presentSeries(samples: Sample[], column: string): MetricSeries {
  return seriesOf(samples.filter(s => s.fields.has(column)), s => fieldOr(s, column));
}

// ============================================
// ANALYZER
// ============================================

export class SarAnalyzer {
  private logger: AnalyzerLogger;
  private config: AnalyzerConfig;
  private source: TelemetrySource;
  private ranker: TopKRanker;

  constructor(logger: AnalyzerLogger, config: AnalyzerConfig, source: TelemetrySource) {
    this.logger = logger;
    this.config = config;
    this.source = source;
    this.ranker = new TopKRanker(config.topN);
  }

  public getRanker(): TopKRanker {
    return this.ranker;
  }

  /**
   * Files are processed one after another; each is finished (every subsystem
   * extracted, scored, ranked) before the next starts.
   */
  public async analyzeAll(files: readonly string[]): Promise<SarAnalysis> {
    const reports: FileReport[] = [];
    for (const file of files) {
      reports.push(await this.analyzeFile(file));
    }
    return { window: this.config.window, files: reports, ranker: this.ranker };
  }

  public async analyzeFile(file: string): Promise<FileReport> {
    this.logger.debug('Analyzing activity file', { file });
    const report: FileReport = {
      file,
      cpu: await this.analyzeCpu(file),
      memory: await this.analyzeMemory(file),
      disk: await this.analyzeDisk(file),
      network: await this.analyzeNetwork(file),
      netErrors: await this.analyzeNetErrors(file),
      sockets: await this.analyzeProtocol(file, 'sock', 'socket', scoreSocket),
      tcp: await this.analyzeProtocol(file, 'tcp', 'tcp', scoreTcp),
      ip: await this.analyzeProtocol(file, 'ip', 'ip', scoreIp)
    };
    this.logger.debug('Activity file done', { file, candidates: this.ranker.offeredCount });
    return report;
  }

  /**
   * Decoded, windowed samples; null when the report type is absent or has no
   * rows inside the window.
   */
  private async load(file: string, reportType: ReportType): Promise<Sample[] | null> {
    const table = await this.source.decode(file, reportType, this.config.window);
    if (!table) return null;
    const windowed = filterTable(table, this.config.window);
    if (windowed.rows.length === 0) return null;
    return extractSamples(windowed, reportType);
  }

  private offer(subsystem: Subsystem, sample: Sample, result: { score: number; description: string }): void {
    if (result.score <= 0) return;
    this.ranker.offer(subsystem, {
      score: result.score,
      timestamp: sample.timestamp,
      description: result.description
    });
  }

  // ============================================
  // CPU
  // ============================================

  private async analyzeCpu(file: string): Promise<CpuSection | NoData> {
    const samples = await this.load(file, 'cpu');
    const aggregate = samples ? aggregateCpuSamples(samples) : [];
    if (aggregate.length === 0) return noData('cpu');

    const t = this.config.thresholds;
    for (const sample of aggregate) {
      this.offer('cpu', sample, scoreCpu(sample, t));
    }

    const busy = seriesOf(aggregate, cpuBusy);
    const iowait = seriesOf(aggregate, s => fieldOr(s, '%iowait'));
    const warnings: string[] = [];

    const p99Iowait = iowait.percentile(0.99);
    if (p99Iowait !== null && p99Iowait > t.cpuIowaitWarn) {
      warnings.push(`iowait p99=${p99Iowait.toFixed(1)}% (>${t.cpuIowaitWarn}%)`);
    }

    const queue = await this.load(file, 'queue');
    let runQueue: RunQueueStats | null = null;
    if (queue) {
      runQueue = {
        runq: presentSeries(queue, 'runq-sz').mean(),
        load1: presentSeries(queue, 'ldavg-1').mean(),
        load5: presentSeries(queue, 'ldavg-5').mean(),
        load15: presentSeries(queue, 'ldavg-15').mean()
      };
      if (runQueue.runq !== null) {
        const pressure = scoreRunQueue(runQueue.runq, this.config.vcpuCount, t);
        if (pressure.score > 0) {
          const limit = runQueueLimit(this.config.vcpuCount, t);
          warnings.push(`runq-sz avg=${runQueue.runq.toFixed(2)} (> ${limit.toFixed(2)})`);
          // a mean above the limit implies some row above it
          const first = queue.find(s => s.fields.has('runq-sz') && fieldOr(s, 'runq-sz') > limit) ?? queue[0];
          this.offer('cpu', first, pressure);
        }
      }
    }

    const switches = await this.load(file, 'switch');

    return {
      status: 'ok',
      avgBusy: busy.mean(),
      avgIowait: iowait.mean(),
      avgSteal: presentSeries(aggregate, '%steal').mean(),
      avgIdle: presentSeries(aggregate, '%idle').mean(),
      runQueue,
      avgCswch: switches ? presentSeries(switches, 'cswch/s').mean() : null,
      p95Busy: busy.percentile(0.95),
      p99Busy: busy.percentile(0.99),
      p95Iowait: iowait.percentile(0.95),
      p99Iowait,
      warnings,
      perCore: this.config.perCpu ? await this.analyzePerCore(file) : null
    };
  }

  private async analyzePerCore(file: string): Promise<CoreBusy[]> {
    const samples = await this.load(file, 'cpu-per-core');
    if (!samples) return [];
    const cores = groupByResource(perCoreCpuSamples(samples));
    return Array.from(cores.entries())
      .map(([cpu, list]) => ({ cpu, avgBusy: mean(list.map(cpuBusy)) }))
      .sort((a, b) => Number(a.cpu) - Number(b.cpu) || a.cpu.localeCompare(b.cpu));
  }

  // ============================================
  // MEMORY
  // ============================================

  private async analyzeMemory(file: string): Promise<MemorySection | NoData> {
    const samples = await this.load(file, 'memory');
    if (!samples) return noData('memory');

    const t = this.config.thresholds;
    for (const sample of samples) {
      this.offer('memory', sample, scoreMemory(sample, t));
    }

    const memused = presentSeries(samples, '%memused');
    const kbavail = presentSeries(samples, 'kbavail');
    const warnings: string[] = [];

    const swap = await this.load(file, 'swap');
    const paging = await this.load(file, 'paging');
    if (paging && paging.some(s => pageScanRate(s) > 0 && fieldOr(s, 'pgsteal/s') > 0)) {
      warnings.push('page cache pressure: pgscan>0 and pgsteal>0 in window');
    }

    return {
      status: 'ok',
      avgMemused: memused.mean(),
      avgKbavail: kbavail.mean(),
      p95Memused: memused.percentile(0.95),
      p99Memused: memused.percentile(0.99),
      p5Kbavail: kbavail.percentile(0.05),
      p1Kbavail: kbavail.percentile(0.01),
      avgSwpused: swap ? presentSeries(swap, '%swpused').mean() : null,
      warnings
    };
  }

  // ============================================
  // DISK
  // ============================================

  private async analyzeDisk(file: string): Promise<DiskSection | NoData> {
    const samples = await this.load(file, 'disk');
    if (!samples) return noData('disk');

    const t = this.config.thresholds;
    const devices: DiskAverages[] = [];
    const warnings: string[] = [];

    for (const [device, list] of groupByResource(samples)) {
      for (const sample of list) {
        this.offer('disk', sample, scoreDisk(sample, t));
      }
      const averages: DiskAverages = {
        device,
        await: mean(list.map(s => fieldOr(s, 'await'))) ?? 0,
        util: mean(list.map(s => fieldOr(s, '%util'))) ?? 0,
        aqu: mean(list.map(s => fieldOr(s, 'aqu-sz'))) ?? 0
      };
      devices.push(averages);
      warnings.push(...diskAverageWarnings(averages, t));
    }

    devices.sort((a, b) => b.await - a.await || a.device.localeCompare(b.device));
    return { status: 'ok', devices, warnings };
  }

  // ============================================
  // NETWORK
  // ============================================

  private async analyzeNetwork(file: string): Promise<NetworkSection | NoData> {
    const samples = await this.load(file, 'net-dev');
    if (!samples) return noData('net-dev');

    const t = this.config.thresholds;
    const usable = samples.filter(s => isReportableInterface(s, this.config.includeLoopback));
    const interfaces: InterfaceSummary[] = [];
    const warnings: string[] = [];

    for (const [iface, list] of groupByResource(usable)) {
      const util = resolveInterfaceUtilization(iface, list, this.config.linkSpeedsMbps);

      if (util.source === 'unknown') {
        warnings.push(
          `unknown link speed for interface ${iface}: %ifutil=0.00 in every sample; ` +
          `set IF_SPEED_Mbps_${iface}=<Mbps> or IF_SPEED_Mbps="${iface}=<Mbps>"`
        );
      }

      list.forEach((sample, i) => {
        this.offer('netdev', sample, scoreNetLoad(sample, util.perSample[i], util.speedMbps, t));
      });

      const load = seriesOf(list, interfaceLoad);
      interfaces.push({
        iface,
        avgRx: mean(list.map(s => fieldOr(s, 'rxkB/s'))),
        avgTx: mean(list.map(s => fieldOr(s, 'txkB/s'))),
        avgIfutil: util.source === 'unknown' ? null : mean(util.perSample),
        utilization: util.source,
        p95Load: load.percentile(0.95),
        p99Load: load.percentile(0.99)
      });
    }

    return { status: 'ok', interfaces, warnings };
  }

  private async analyzeNetErrors(file: string): Promise<ColumnAverages | NoData> {
    const samples = await this.load(file, 'net-err');
    if (!samples) return noData('net-err');

    const t = this.config.thresholds;
    const usable = samples.filter(s => isReportableInterface(s, this.config.includeLoopback));
    for (const sample of usable) {
      this.offer('neterr', sample, scoreNetErrors(sample, t));
    }
    return this.columnAverages('net-err', usable);
  }

  // ============================================
  // SOCKET / TCP / IP
  // ============================================

  private async analyzeProtocol(
    file: string,
    reportType: ReportType,
    subsystem: Subsystem,
    score: (sample: Sample) => { score: number; description: string }
  ): Promise<ColumnAverages | NoData> {
    const samples = await this.load(file, reportType);
    if (!samples) return noData(reportType);

    for (const sample of samples) {
      this.offer(subsystem, sample, score(sample));
    }
    return this.columnAverages(reportType, samples);
  }

  private columnAverages(reportType: ReportType, samples: Sample[]): ColumnAverages {
    const averages = DECLARED_COLUMNS[reportType]
      .filter(column => samples.some(s => s.fields.has(column)))
      .map(column => ({ column, value: presentSeries(samples, column).mean() }));
    return { status: 'ok', report: reportLabel(reportType), averages };
  }
}
