// Type definitions

export type Subsystem =
  | 'cpu'
  | 'memory'
  | 'disk'
  | 'netdev'
  | 'neterr'
  | 'socket'
  | 'tcp'
  | 'ip';

export const SUBSYSTEMS: readonly Subsystem[] = [
  'cpu',
  'memory',
  'disk',
  'netdev',
  'neterr',
  'socket',
  'tcp',
  'ip'
];

/**
 * One logical table the decoder can export for an activity file. Several report
 * types feed the same subsystem (swap and paging belong to memory, run queue and
 * context switches to cpu).
 */
export type ReportType =
  | 'cpu'
  | 'cpu-per-core'
  | 'queue'
  | 'switch'
  | 'memory'
  | 'swap'
  | 'paging'
  | 'disk'
  | 'net-dev'
  | 'net-err'
  | 'sock'
  | 'tcp'
  | 'ip';

export interface TimeWindow {
  // zero-padded HH:MM:SS; start === end means the whole day
  start: string;
  end: string;
}

export type ColumnIndex = ReadonlyMap<string, number>;

export interface DecodedRow {
  columns: ColumnIndex;
  values: string[];
}

export interface DecodedTable {
  header: string[];
  rows: DecodedRow[];
}

export interface Sample {
  timestamp: string;
  subsystem: Subsystem;
  reportType: ReportType;
  // CPU id, block device or interface name; '' for whole-system metrics
  resourceKey: string;
  // only columns present in the header the row was read under
  fields: ReadonlyMap<string, number>;
}

export interface Candidate {
  score: number;
  timestamp: string;
  description: string;
}

export interface ScoreResult {
  score: number;
  description: string;
}

export interface Thresholds {
  cpuBusyPct: number;
  cpuIowaitWarn: number;
  cpuStealWarn: number;
  runqFactor: number;
  memUsedPct: number;
  memAvailKb: number;
  diskAwaitWarn: number;
  diskAwaitSpike: number;
  diskUtilWarn: number;
  diskUtilSpike: number;
  diskAquSpike: number;
  ifutilWarn: number;
  netErrMin: number;
}
