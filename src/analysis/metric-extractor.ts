// metric-extractor.ts - Map header-declared columns to typed samples per subsystem
import { DecodedTable, ReportType, Sample, Subsystem } from '../types';
import { cell, hasColumn, parseNumber } from '../telemetry/decoded-table';

// ============================================
// DECLARED COLUMNS
// ============================================

/**
 * Numeric columns each report type knows how to interpret. Anything else in
 * the header is ignored.
 */
export const DECLARED_COLUMNS: Record<ReportType, readonly string[]> = {
  'cpu': ['%user', '%system', '%iowait', '%steal', '%idle'],
  'cpu-per-core': ['%user', '%system', '%iowait', '%steal', '%idle'],
  'queue': ['runq-sz', 'plist-sz', 'ldavg-1', 'ldavg-5', 'ldavg-15', 'blocked'],
  'switch': ['proc/s', 'cswch/s'],
  'memory': ['%memused', 'kbavail', 'kbmemfree', 'kbmemused'],
  'swap': ['%swpused', 'kbswpused'],
  'paging': ['pgscan/s', 'pgscank/s', 'pgscand/s', 'pgsteal/s'],
  'disk': ['await', '%util', 'aqu-sz'],
  'net-dev': ['rxkB/s', 'txkB/s', '%ifutil'],
  'net-err': ['rxerr/s', 'txerr/s', 'rxdrop/s', 'txdrop/s'],
  'sock': ['totsck', 'tcpsck', 'udpsck', 'tcp-tw'],
  'tcp': ['active/s', 'passive/s', 'retrans/s', 'estab', 'inerr'],
  'ip': ['irec/s', 'idel/s', 'irej/s']
};

// Older sysstat releases name some columns differently
const COLUMN_ALIASES: Record<string, string> = {
  'avgqu-sz': 'aqu-sz'
};

const RESOURCE_COLUMN: Partial<Record<ReportType, string>> = {
  'cpu': 'CPU',
  'cpu-per-core': 'CPU',
  'disk': 'DEV',
  'net-dev': 'IFACE',
  'net-err': 'IFACE'
};

export const REPORT_SUBSYSTEM: Record<ReportType, Subsystem> = {
  'cpu': 'cpu',
  'cpu-per-core': 'cpu',
  'queue': 'cpu',
  'switch': 'cpu',
  'memory': 'memory',
  'swap': 'memory',
  'paging': 'memory',
  'disk': 'disk',
  'net-dev': 'netdev',
  'net-err': 'neterr',
  'sock': 'socket',
  'tcp': 'tcp',
  'ip': 'ip'
};

const AGGREGATE_CPU_IDS = new Set(['-1', 'all']);
const LOOPBACK = 'lo';
const DATED_TIMESTAMP = /^\d{4}-\d{2}-\d{2} /;

// ============================================
// EXTRACTION
// ============================================

export function extractSamples(table: DecodedTable, reportType: ReportType): Sample[] {
  const declared = DECLARED_COLUMNS[reportType];
  const resourceColumn = RESOURCE_COLUMN[reportType];
  const subsystem = REPORT_SUBSYSTEM[reportType];

  return table.rows.map(row => {
    const fields = new Map<string, number>();
    for (const column of declared) {
      if (hasColumn(row, column)) {
        fields.set(column, parseNumber(cell(row, column)));
      }
    }
    for (const [alias, canonical] of Object.entries(COLUMN_ALIASES)) {
      if (declared.includes(canonical) && !fields.has(canonical) && hasColumn(row, alias)) {
        fields.set(canonical, parseNumber(cell(row, alias)));
      }
    }

    return {
      timestamp: cell(row, 'timestamp') ?? '',
      subsystem,
      reportType,
      resourceKey: resourceColumn ? (cell(row, resourceColumn) ?? '') : '',
      fields
    };
  });
}

/**
 * Present value, or the fallback when the column was not in the header.
 * Callers that must tell "absent" from zero use `sample.fields.has()`.
 */
export function fieldOr(sample: Sample, column: string, fallback: number = 0): number {
  return sample.fields.get(column) ?? fallback;
}

export function isAggregateCpu(resourceKey: string): boolean {
  return AGGREGATE_CPU_IDS.has(resourceKey);
}

export function aggregateCpuSamples(samples: Sample[]): Sample[] {
  return samples.filter(s => isAggregateCpu(s.resourceKey));
}

export function perCoreCpuSamples(samples: Sample[]): Sample[] {
  return samples.filter(s => s.resourceKey !== '' && !isAggregateCpu(s.resourceKey));
}

export function isReportableInterface(sample: Sample, includeLoopback: boolean): boolean {
  const iface = sample.resourceKey;
  if (!DATED_TIMESTAMP.test(sample.timestamp)) return false;
  if (!iface || /\s/.test(iface) || iface === 'IFACE' || iface.startsWith('LINUX-RESTART')) return false;
  if (!includeLoopback && iface === LOOPBACK) return false;
  return true;
}

export function groupByResource(samples: Sample[]): Map<string, Sample[]> {
  const groups = new Map<string, Sample[]>();
  for (const sample of samples) {
    const list = groups.get(sample.resourceKey);
    if (list) list.push(sample);
    else groups.set(sample.resourceKey, [sample]);
  }
  return groups;
}

/**
 * `sar -B` reports pgscank/s and pgscand/s on current kernels; older exports
 * carry a single pgscan/s.
 */
export function pageScanRate(sample: Sample): number {
  if (sample.fields.has('pgscan/s')) return fieldOr(sample, 'pgscan/s');
  return fieldOr(sample, 'pgscank/s') + fieldOr(sample, 'pgscand/s');
}

// ============================================
// INTERFACE UTILIZATION
// ============================================

export type UtilizationSource = 'measured' | 'estimated' | 'unknown';

export interface InterfaceUtilization {
  iface: string;
  speedMbps: number | null;
  source: UtilizationSource;
  // aligned with the samples passed in
  perSample: number[];
}

export function estimateIfutil(rxKBps: number, txKBps: number, speedMbps: number): number {
  return (100 * (rxKBps + txKBps) * 1024 * 8) / (speedMbps * 1_000_000);
}

export function interfaceLoad(sample: Sample): number {
  return fieldOr(sample, 'rxkB/s') + fieldOr(sample, 'txkB/s');
}

/**
 * The native %ifutil is trusted when it is non-zero for at least one sample.
 * Otherwise it is estimated from rx+tx and the configured link speed, or left
 * as unknown when no speed is configured.
 */
export function resolveInterfaceUtilization(
  iface: string,
  samples: Sample[],
  speeds: ReadonlyMap<string, number>
): InterfaceUtilization {
  const native = samples.map(s => fieldOr(s, '%ifutil'));
  const speed = speeds.get(iface) ?? null;

  if (native.some(v => v > 0)) {
    return { iface, speedMbps: speed, source: 'measured', perSample: native };
  }

  if (speed !== null && speed > 0) {
    return {
      iface,
      speedMbps: speed,
      source: 'estimated',
      perSample: samples.map(s => estimateIfutil(fieldOr(s, 'rxkB/s'), fieldOr(s, 'txkB/s'), speed))
    };
  }

  return { iface, speedMbps: null, source: 'unknown', perSample: native };
}
