// anomaly-scorer.ts - Threshold rules that turn one observation into a severity score
//
// Weights follow one convention across subsystems: a single clearly bad
// condition costs 2-4 points. That is what lets the merged ranking compare a
// disk spike with a TCP retransmit burst.
import { Sample, ScoreResult, Thresholds } from '../types';
import { fieldOr, interfaceLoad } from './metric-extractor';

const NONE: ScoreResult = Object.freeze({ score: 0, description: '' });

const fmt = (value: number, digits: number): string => value.toFixed(digits);

// ============================================
// CPU
// ============================================

export function cpuBusy(sample: Sample): number {
  return fieldOr(sample, '%user') + fieldOr(sample, '%system');
}

export function scoreCpu(sample: Sample, t: Thresholds): ScoreResult {
  const busy = cpuBusy(sample);
  const iowait = fieldOr(sample, '%iowait');
  const steal = fieldOr(sample, '%steal');

  let score = 0;
  if (busy > t.cpuBusyPct) score += 2;
  if (iowait > t.cpuIowaitWarn) score += 2;
  if (steal > t.cpuStealWarn) score += 3;

  if (score === 0) return NONE;
  return { score, description: `busy=${fmt(busy, 1)}% iow=${fmt(iowait, 1)}% steal=${fmt(steal, 1)}%` };
}

export function runQueueLimit(vcpuCount: number, t: Thresholds): number {
  return vcpuCount * t.runqFactor;
}

/**
 * Window-level check on the mean run queue; yields one scheduler-pressure
 * candidate per file at most.
 */
export function scoreRunQueue(meanRunq: number, vcpuCount: number, t: Thresholds): ScoreResult {
  const limit = runQueueLimit(vcpuCount, t);
  if (!(meanRunq > limit)) return NONE;
  return { score: 2, description: `runq avg=${fmt(meanRunq, 2)} (> ${fmt(limit, 2)})` };
}

// ============================================
// MEMORY
// ============================================

export function scoreMemory(sample: Sample, t: Thresholds): ScoreResult {
  const memused = fieldOr(sample, '%memused');
  const kbavail = fieldOr(sample, 'kbavail');
  // zero/zero rows carry no data
  if (memused === 0 && kbavail === 0) return NONE;

  let score = 0;
  if (memused > t.memUsedPct) score += 2;
  if (sample.fields.has('kbavail') && kbavail < t.memAvailKb) score += 3;

  if (score === 0) return NONE;
  return { score, description: `%memused=${fmt(memused, 1)} kbavail=${fmt(kbavail, 0)}` };
}

// ============================================
// DISK
// ============================================

export function scoreDisk(sample: Sample, t: Thresholds): ScoreResult {
  const awaitMs = fieldOr(sample, 'await');
  const util = fieldOr(sample, '%util');
  const aqu = fieldOr(sample, 'aqu-sz');

  let score = 0;
  if (awaitMs >= t.diskAwaitSpike) score += 3;
  if (util >= t.diskUtilSpike) score += 3;
  if (aqu >= t.diskAquSpike) score += 2;

  if (score === 0) return NONE;
  return {
    score,
    description: `DEV=${sample.resourceKey} await=${fmt(awaitMs, 1)}ms util=${fmt(util, 0)}% aqu=${fmt(aqu, 2)}`
  };
}

export interface DiskAverages {
  device: string;
  await: number;
  util: number;
  aqu: number;
}

export function diskAverageWarnings(avg: DiskAverages, t: Thresholds): string[] {
  const warnings: string[] = [];
  if (avg.await > t.diskAwaitWarn) {
    warnings.push(`${avg.device} avg await=${fmt(avg.await, 1)}ms (>${fmt(t.diskAwaitWarn, 0)}ms)`);
  }
  if (avg.util > t.diskUtilWarn) {
    warnings.push(`${avg.device} avg %util=${fmt(avg.util, 1)} (>${fmt(t.diskUtilWarn, 0)}%)`);
  }
  return warnings;
}

// ============================================
// NETWORK
// ============================================

/**
 * Only interfaces with a configured link speed are scored. A native %ifutil
 * without one still feeds the averages line.
 */
export function scoreNetLoad(
  sample: Sample,
  ifutil: number,
  speedMbps: number | null,
  t: Thresholds
): ScoreResult {
  if (speedMbps === null || !(speedMbps > 0)) return NONE;
  if (!(ifutil >= t.ifutilWarn)) return NONE;
  return {
    score: 2,
    description: `IF=${sample.resourceKey} load=${fmt(interfaceLoad(sample), 1)}kB/s ifutil=${fmt(ifutil, 1)}%`
  };
}

export function scoreNetErrors(sample: Sample, t: Thresholds): ScoreResult {
  const rxerr = fieldOr(sample, 'rxerr/s');
  const txerr = fieldOr(sample, 'txerr/s');
  const rxdrop = fieldOr(sample, 'rxdrop/s');
  const txdrop = fieldOr(sample, 'txdrop/s');

  let score = 0;
  if (rxerr > t.netErrMin || txerr > t.netErrMin) score += 3;
  if (rxdrop > t.netErrMin || txdrop > t.netErrMin) score += 2;

  if (score === 0) return NONE;
  return {
    score,
    description:
      `IF=${sample.resourceKey} rxerr=${fmt(rxerr, 1)} txerr=${fmt(txerr, 1)} ` +
      `rxdrop=${fmt(rxdrop, 1)} txdrop=${fmt(txdrop, 1)}`
  };
}

// ============================================
// SOCKET / TCP / IP
// ============================================

export function scoreSocket(sample: Sample): ScoreResult {
  const tw = fieldOr(sample, 'tcp-tw');
  if (!(tw > 0)) return NONE;
  return {
    score: 1,
    description:
      `SOCK tots=${fmt(fieldOr(sample, 'totsck'), 0)} tcp=${fmt(fieldOr(sample, 'tcpsck'), 0)} ` +
      `udp=${fmt(fieldOr(sample, 'udpsck'), 0)} tw=${fmt(tw, 0)}`
  };
}

export function scoreTcp(sample: Sample): ScoreResult {
  const active = fieldOr(sample, 'active/s');
  const passive = fieldOr(sample, 'passive/s');
  const retrans = fieldOr(sample, 'retrans/s');
  const inerr = fieldOr(sample, 'inerr');

  let score = 0;
  if (retrans > 0) score += 4;
  if (inerr > 0) score += 4;
  if (active > 0 || passive > 0) score += 1;

  if (score === 0) return NONE;
  return {
    score,
    description:
      `TCP active/s=${fmt(active, 1)} passive/s=${fmt(passive, 1)} retrans/s=${fmt(retrans, 1)} ` +
      `estab=${fmt(fieldOr(sample, 'estab'), 0)} inerr=${fmt(inerr, 1)}`
  };
}

export function scoreIp(sample: Sample): ScoreResult {
  const irec = fieldOr(sample, 'irec/s');
  const idel = fieldOr(sample, 'idel/s');
  const irej = fieldOr(sample, 'irej/s');

  let score = 0;
  if (irej > 0) score += 3;
  if (irec > 1000 && idel > 0) score += 1;

  if (score === 0) return NONE;
  return { score, description: `IP irec/s=${fmt(irec, 1)} idel/s=${fmt(idel, 1)} irej/s=${fmt(irej, 1)}` };
}
