import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import { parseWindow, FULL_DAY } from '../telemetry/window-filter';
import { Thresholds, TimeWindow } from '../types';

export interface SourceConfig {
  saDirs: string[];
  decoderTimeoutMs: number;
}

export interface OutputConfig {
  auditDir: string;
  archive: boolean;
  cleanTmp: boolean;
  logDir: string | null;
}

export interface AtopConfig {
  window: TimeWindow;
  logPath: string;
  file: string | null;
  topN: number;
  spikeThresholds: {
    cpu: number;
    mem: number;
    dsk: number;
    net: number;
  };
}

export interface WebLogConfig {
  logDir: string;
  // inclusive day range ending today (UTC)
  days: number;
  window: TimeWindow;
  // caps the 5xx event stream; null prints every event
  eventLimit: number | null;
}

export interface AnalyzerConfig {
  window: TimeWindow;
  maxFiles: number;
  topN: number;
  debug: boolean;
  includeLoopback: boolean;
  perCpu: boolean;
  vcpuCount: number;
  thresholds: Thresholds;
  linkSpeedsMbps: ReadonlyMap<string, number>;
  sources: SourceConfig;
  output: OutputConfig;
  atop: AtopConfig;
  weblog: WebLogConfig;
}

export interface HostFacts {
  cpuCount: number;
  homeDir: string;
}

export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = Object.freeze({
  cpuBusyPct: 75,
  cpuIowaitWarn: 5,
  cpuStealWarn: 1,
  runqFactor: 1.0,
  memUsedPct: 80,
  memAvailKb: 1048576,
  diskAwaitWarn: 20,
  diskAwaitSpike: 50,
  diskUtilWarn: 70,
  diskUtilSpike: 90,
  diskAquSpike: 5,
  ifutilWarn: 70,
  netErrMin: 0
});

export const DEFAULT_WINDOW: Readonly<TimeWindow> = Object.freeze({ start: '08:00:00', end: '19:00:00' });
export const DEFAULT_MAX_FILES = 4;
export const DEFAULT_TOPN = 20;
export const DEFAULT_SA_DIRS = ['/var/log/sa', '/var/log/sysstat'];
export const DEFAULT_DECODER_TIMEOUT_MS = 30000;
export const LINK_SPEED_OVERRIDE_PREFIX = 'IF_SPEED_Mbps_';

// ============================================
// ENV SCHEMA
// ============================================

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const threshold = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().finite().nonnegative().default(fallback));

const count = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(fallback));

const flag = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z.string().optional().transform(value => (value === undefined ? fallback : asBoolean(value)))
  );

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const envSchema = z.object({
  START: text(DEFAULT_WINDOW.start),
  END: text(DEFAULT_WINDOW.end),
  MAX_FILES: count(DEFAULT_MAX_FILES),
  TOPN: count(DEFAULT_TOPN),
  DEBUG: flag(false),
  INCLUDE_LO: flag(false),
  PER_CPU: flag(false),
  VCPU_COUNT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).optional()),

  CPU_BUSY_PCT: threshold(DEFAULT_THRESHOLDS.cpuBusyPct),
  CPU_IOWAIT_WARN: threshold(DEFAULT_THRESHOLDS.cpuIowaitWarn),
  CPU_STEAL_WARN: threshold(DEFAULT_THRESHOLDS.cpuStealWarn),
  RUNQ_FACTOR: threshold(DEFAULT_THRESHOLDS.runqFactor),
  DISK_AWAIT_WARN: threshold(DEFAULT_THRESHOLDS.diskAwaitWarn),
  DISK_AWAIT_SPIKE: threshold(DEFAULT_THRESHOLDS.diskAwaitSpike),
  DISK_UTIL_WARN: threshold(DEFAULT_THRESHOLDS.diskUtilWarn),
  DISK_UTIL_SPIKE: threshold(DEFAULT_THRESHOLDS.diskUtilSpike),
  DISK_AQU_SPIKE: threshold(DEFAULT_THRESHOLDS.diskAquSpike),
  IFUTIL_WARN: threshold(DEFAULT_THRESHOLDS.ifutilWarn),
  NET_ERR_MIN: threshold(DEFAULT_THRESHOLDS.netErrMin),
  IF_SPEED_Mbps: z.preprocess(blankToUndefined, z.string().optional()),

  SA_DIRS: z.preprocess(blankToUndefined, z.string().optional()),
  DECODER_TIMEOUT_MS: count(DEFAULT_DECODER_TIMEOUT_MS),
  AUDIT_DIR: z.preprocess(blankToUndefined, z.string().optional()),
  ARCHIVE: flag(true),
  CLEAN_TMP: flag(true),
  LOG_DIR: z.preprocess(blankToUndefined, z.string().optional()),

  FULL_DAY: flag(true),
  B: text('09:00'),
  E: text('19:00'),
  LOGPATH: text('/var/log/atop'),
  F: z.preprocess(blankToUndefined, z.string().optional()),
  ATOP_TOPN: count(20),
  CPU_THR: threshold(80),
  MEM_THR: threshold(80),
  DSK_THR: threshold(80),
  NET_THR: threshold(100000),

  WEBLOG_DIR: text('/var/log/nginx'),
  WEBLOG_DAYS: count(7),
  WEBLOG_USE_WINDOW: flag(false),
  FIVE_XX_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).optional())
});

export const asBoolean = (value: unknown): boolean =>
  value === true || value === 'true' || value === '1' || (typeof value === 'string' && value.toLowerCase() === 'yes');

// ============================================
// LINK SPEEDS
// ============================================

function parseSpeed(label: string, raw: string, issues: string[]): number | null {
  const speed = Number(raw.trim());
  if (!Number.isFinite(speed) || speed <= 0) {
    issues.push(`${label}: link speed "${raw.trim()}" must be a positive number of Mbps`);
    return null;
  }
  return speed;
}

/**
 * `IF_SPEED_Mbps="eth0=1000, ens18 = 10000"` plus `IF_SPEED_Mbps_<iface>=<Mbps>`
 * overrides; an override wins over the list entry for the same interface.
 */
export function parseLinkSpeeds(env: NodeJS.ProcessEnv, issues: string[] = []): Map<string, number> {
  const speeds = new Map<string, number>();
  const list = env.IF_SPEED_Mbps?.trim();

  if (list) {
    for (const entry of list.split(',')) {
      if (!entry.trim()) continue;
      const match = /^\s*([^=\s]+)\s*=\s*(.+?)\s*$/.exec(entry);
      if (!match) {
        issues.push(`IF_SPEED_Mbps: entry "${entry.trim()}" is not iface=Mbps`);
        continue;
      }
      const speed = parseSpeed('IF_SPEED_Mbps', match[2], issues);
      if (speed !== null) speeds.set(match[1], speed);
    }
  }

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(LINK_SPEED_OVERRIDE_PREFIX) || value === undefined || value.trim() === '') continue;
    const iface = key.slice(LINK_SPEED_OVERRIDE_PREFIX.length);
    if (!iface) continue;
    const speed = parseSpeed(key, value, issues);
    if (speed !== null) speeds.set(iface, speed);
  }

  return speeds;
}

// ============================================
// LOADING
// ============================================

function defaultHostFacts(): HostFacts {
  return {
    cpuCount: os.cpus().length || 1,
    homeDir: os.homedir()
  };
}

/**
 * Build the immutable run configuration from the environment. Every problem is
 * collected and reported at once, before any file is read.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, host: HostFacts = defaultHostFacts()): AnalyzerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  const values = parsed.data;
  const issues: string[] = [];

  let window: TimeWindow = DEFAULT_WINDOW;
  try {
    window = parseWindow(values.START, values.END);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    issues.push(...error.issues);
  }

  let atopWindow: TimeWindow = FULL_DAY;
  if (!values.FULL_DAY) {
    try {
      atopWindow = parseWindow(values.B, values.E, ['B', 'E']);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      issues.push(...error.issues);
    }
  }

  const linkSpeedsMbps = parseLinkSpeeds(env, issues);

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const auditDir = values.AUDIT_DIR ?? path.join(host.homeDir, 'audit');
  const saDirs = values.SA_DIRS
    ? values.SA_DIRS.split(',').map(dir => dir.trim()).filter(Boolean)
    : [...DEFAULT_SA_DIRS];

  const config: AnalyzerConfig = {
    window,
    maxFiles: values.MAX_FILES,
    topN: values.TOPN,
    debug: values.DEBUG,
    includeLoopback: values.INCLUDE_LO,
    perCpu: values.PER_CPU,
    vcpuCount: values.VCPU_COUNT ?? host.cpuCount,
    thresholds: Object.freeze({
      ...DEFAULT_THRESHOLDS,
      cpuBusyPct: values.CPU_BUSY_PCT,
      cpuIowaitWarn: values.CPU_IOWAIT_WARN,
      cpuStealWarn: values.CPU_STEAL_WARN,
      runqFactor: values.RUNQ_FACTOR,
      diskAwaitWarn: values.DISK_AWAIT_WARN,
      diskAwaitSpike: values.DISK_AWAIT_SPIKE,
      diskUtilWarn: values.DISK_UTIL_WARN,
      diskUtilSpike: values.DISK_UTIL_SPIKE,
      diskAquSpike: values.DISK_AQU_SPIKE,
      ifutilWarn: values.IFUTIL_WARN,
      netErrMin: values.NET_ERR_MIN
    }),
    linkSpeedsMbps,
    sources: Object.freeze({
      saDirs,
      decoderTimeoutMs: values.DECODER_TIMEOUT_MS
    }),
    output: Object.freeze({
      auditDir,
      archive: values.ARCHIVE,
      cleanTmp: values.CLEAN_TMP,
      logDir: values.LOG_DIR ?? null
    }),
    atop: Object.freeze({
      window: atopWindow,
      logPath: values.LOGPATH,
      file: values.F ?? null,
      topN: values.ATOP_TOPN,
      spikeThresholds: Object.freeze({
        cpu: values.CPU_THR,
        mem: values.MEM_THR,
        dsk: values.DSK_THR,
        net: values.NET_THR
      })
    }),
    weblog: Object.freeze({
      logDir: values.WEBLOG_DIR,
      days: values.WEBLOG_DAYS,
      window: values.WEBLOG_USE_WINDOW ? window : FULL_DAY,
      eventLimit: values.FIVE_XX_LIMIT ?? null
    })
  };

  return Object.freeze(config);
}

/**
 * Defaults-only configuration; tests start from this and override fields.
 */
export function defaultConfig(overrides: Partial<AnalyzerConfig> = {}): AnalyzerConfig {
  const base = loadConfig({}, { cpuCount: 1, homeDir: '/tmp' });
  return { ...base, ...overrides };
}
