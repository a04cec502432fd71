import { ConfigurationError } from '../src/common/errors';
import {
  asBoolean,
  DEFAULT_THRESHOLDS,
  defaultConfig,
  loadConfig,
  parseLinkSpeeds
} from '../src/config/config';
import { FULL_DAY } from '../src/telemetry/window-filter';

const HOST = { cpuCount: 4, homeDir: '/home/auditor' };

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfig - defaults', () => {
  it('fills every setting from defaults and host facts', () => {
    const config = loadConfig({}, HOST);

    expect(config.window).toEqual({ start: '08:00:00', end: '19:00:00' });
    expect(config.maxFiles).toBe(4);
    expect(config.topN).toBe(20);
    expect(config.debug).toBe(false);
    expect(config.includeLoopback).toBe(false);
    expect(config.perCpu).toBe(false);
    expect(config.vcpuCount).toBe(4);
    expect(config.thresholds).toEqual(DEFAULT_THRESHOLDS);
    expect(config.linkSpeedsMbps.size).toBe(0);
    expect(config.sources.saDirs).toEqual(['/var/log/sa', '/var/log/sysstat']);
    expect(config.output).toEqual({
      auditDir: '/home/auditor/audit',
      archive: true,
      cleanTmp: true,
      logDir: null
    });
    expect(config.atop.window).toEqual(FULL_DAY);
    expect(config.atop.logPath).toBe('/var/log/atop');
    expect(config.atop.file).toBeNull();
    expect(config.atop.spikeThresholds).toEqual({ cpu: 80, mem: 80, dsk: 80, net: 100000 });
    expect(config.weblog).toEqual({ logDir: '/var/log/nginx', days: 7, window: FULL_DAY, eventLimit: null });
  });

  it('is immutable', () => {
    const config = loadConfig({}, HOST);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.thresholds)).toBe(true);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ TOPN: '', START: '  ', CPU_BUSY_PCT: '' }, HOST);
    expect(config.topN).toBe(20);
    expect(config.window.start).toBe('08:00:00');
    expect(config.thresholds.cpuBusyPct).toBe(75);
  });

  it('starts tests from a one-CPU host in /tmp', () => {
    const config = defaultConfig({ topN: 3 });
    expect(config.topN).toBe(3);
    expect(config.vcpuCount).toBe(1);
    expect(config.output.auditDir).toBe('/tmp/audit');
  });
});

describe('loadConfig - overrides', () => {
  it('applies environment values', () => {
    const config = loadConfig({
      START: '9:30',
      END: '17:00',
      TOPN: '5',
      MAX_FILES: '2',
      CPU_BUSY_PCT: '90',
      DISK_AWAIT_SPIKE: '40',
      DEBUG: 'yes',
      PER_CPU: '1',
      SA_DIRS: '/data/sa, /backup/sa',
      ARCHIVE: '0',
      VCPU_COUNT: '8',
      AUDIT_DIR: '/srv/audit',
      LOG_DIR: '/srv/logs'
    }, HOST);

    expect(config.window).toEqual({ start: '09:30:00', end: '17:00:00' });
    expect(config.topN).toBe(5);
    expect(config.maxFiles).toBe(2);
    expect(config.thresholds.cpuBusyPct).toBe(90);
    expect(config.thresholds.diskAwaitSpike).toBe(40);
    expect(config.thresholds.memUsedPct).toBe(80);
    expect(config.debug).toBe(true);
    expect(config.perCpu).toBe(true);
    expect(config.sources.saDirs).toEqual(['/data/sa', '/backup/sa']);
    expect(config.output.archive).toBe(false);
    expect(config.output.auditDir).toBe('/srv/audit');
    expect(config.output.logDir).toBe('/srv/logs');
    expect(config.vcpuCount).toBe(8);
  });

  it('uses the B/E window for atop when FULL_DAY is off', () => {
    const config = loadConfig({ FULL_DAY: '0', B: '9:00', E: '18:00', F: '/tmp/atop_20240305' }, HOST);
    expect(config.atop.window).toEqual({ start: '09:00:00', end: '18:00:00' });
    expect(config.atop.file).toBe('/tmp/atop_20240305');
  });

  it('applies the START/END window to web logs on request', () => {
    const config = loadConfig({ WEBLOG_USE_WINDOW: '1', WEBLOG_DAYS: '2', FIVE_XX_LIMIT: '100', WEBLOG_DIR: '/srv/logs' }, HOST);
    expect(config.weblog).toEqual({
      logDir: '/srv/logs',
      days: 2,
      window: { start: '08:00:00', end: '19:00:00' },
      eventLimit: 100
    });
  });
});

describe('loadConfig - errors', () => {
  it('rejects values the schema cannot coerce', () => {
    expect(() => loadConfig({ TOPN: '0' }, HOST)).toThrow(ConfigurationError);
    expect(() => loadConfig({ CPU_BUSY_PCT: 'high' }, HOST)).toThrow(ConfigurationError);
  });

  it('collects window and link speed problems into one error', () => {
    expect(issuesOf(() => loadConfig({ START: '19:00', END: '08:00', IF_SPEED_Mbps: 'eth0=fast' }, HOST))).toEqual([
      'START=19:00:00 is after END=08:00:00',
      'IF_SPEED_Mbps: link speed "fast" must be a positive number of Mbps'
    ]);
  });

  it('validates the atop window only when it is used', () => {
    expect(() => loadConfig({ B: 'later' }, HOST)).not.toThrow();
    expect(issuesOf(() => loadConfig({ FULL_DAY: '0', B: 'later' }, HOST))).toEqual([
      'B="later" is not a time of day (HH:MM or HH:MM:SS)'
    ]);
  });
});

describe('parseLinkSpeeds', () => {
  it('reads the list and lets per-interface overrides win', () => {
    const speeds = parseLinkSpeeds({
      IF_SPEED_Mbps: 'eth0=1000, ens18 = 10000',
      IF_SPEED_Mbps_eth0: '100'
    });
    expect(speeds.get('eth0')).toBe(100);
    expect(speeds.get('ens18')).toBe(10000);
    expect(speeds.size).toBe(2);
  });

  it('records malformed entries and non-positive speeds', () => {
    const issues: string[] = [];
    const speeds = parseLinkSpeeds({ IF_SPEED_Mbps: 'eth0,bond0=-5', IF_SPEED_Mbps_eth1: '0' }, issues);

    expect(speeds.size).toBe(0);
    expect(issues).toEqual([
      'IF_SPEED_Mbps: entry "eth0" is not iface=Mbps',
      'IF_SPEED_Mbps: link speed "-5" must be a positive number of Mbps',
      'IF_SPEED_Mbps_eth1: link speed "0" must be a positive number of Mbps'
    ]);
  });
});

describe('asBoolean', () => {
  it('accepts the usual truthy spellings', () => {
    expect(['1', 'true', 'yes', 'YES', true].map(asBoolean)).toEqual([true, true, true, true, true]);
    expect(['0', 'false', 'no', ''].map(asBoolean)).toEqual([false, false, false, false]);
  });
});
