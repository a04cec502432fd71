import { DEFAULT_THRESHOLDS } from '../src/config/config';
import {
  diskAverageWarnings,
  scoreCpu,
  scoreDisk,
  scoreIp,
  scoreMemory,
  scoreNetErrors,
  scoreNetLoad,
  scoreRunQueue,
  scoreSocket,
  scoreTcp
} from '../src/analysis/anomaly-scorer';
import { makeSample } from './helpers/fixture-source';

const t = DEFAULT_THRESHOLDS;

describe('scoreCpu', () => {
  it('scores busy time strictly above the threshold', () => {
    expect(scoreCpu(makeSample('cpu', { '%user': 70, '%system': 6 }, '-1'), t)).toEqual({
      score: 2,
      description: 'busy=76.0% iow=0.0% steal=0.0%'
    });
    expect(scoreCpu(makeSample('cpu', { '%user': 70, '%system': 5 }, '-1'), t).score).toBe(0);
  });

  it('adds iowait and steal penalties', () => {
    const result = scoreCpu(makeSample('cpu', { '%user': 80, '%system': 10, '%iowait': 5.1, '%steal': 1.5 }, '-1'), t);
    expect(result).toEqual({ score: 7, description: 'busy=90.0% iow=5.1% steal=1.5%' });
  });

  it('leaves a quiet sample unscored', () => {
    expect(scoreCpu(makeSample('cpu', { '%user': 10, '%system': 5, '%iowait': 5, '%steal': 1 }, '-1'), t))
      .toEqual({ score: 0, description: '' });
  });
});

describe('scoreRunQueue', () => {
  it('flags a mean run queue above vcpus times the factor', () => {
    expect(scoreRunQueue(1.5, 1, t)).toEqual({ score: 2, description: 'runq avg=1.50 (> 1.00)' });
    expect(scoreRunQueue(1.0, 1, t).score).toBe(0);
    expect(scoreRunQueue(3.9, 4, t).score).toBe(0);
  });
});

describe('scoreMemory', () => {
  it('scores high usage and low available memory separately', () => {
    expect(scoreMemory(makeSample('memory', { '%memused': 85, kbavail: 2000000 }), t)).toEqual({
      score: 2,
      description: '%memused=85.0 kbavail=2000000'
    });
    expect(scoreMemory(makeSample('memory', { '%memused': 50, kbavail: 500000 }), t).score).toBe(3);
    expect(scoreMemory(makeSample('memory', { '%memused': 90, kbavail: 500000 }), t).score).toBe(5);
  });

  it('only applies the available-memory rule when the column exists', () => {
    expect(scoreMemory(makeSample('memory', { '%memused': 50 }), t).score).toBe(0);
    expect(scoreMemory(makeSample('memory', { '%memused': 85 }), t)).toEqual({
      score: 2,
      description: '%memused=85.0 kbavail=0'
    });
  });

  it('leaves usage at 80% and available memory at 1 GiB unscored', () => {
    expect(scoreMemory(makeSample('memory', { '%memused': 80, kbavail: 2000000 }), t).score).toBe(0);
    expect(scoreMemory(makeSample('memory', { '%memused': 80.1, kbavail: 2000000 }), t).score).toBe(2);
    expect(scoreMemory(makeSample('memory', { '%memused': 50, kbavail: 1048576 }), t).score).toBe(0);
    expect(scoreMemory(makeSample('memory', { '%memused': 50, kbavail: 1048575 }), t).score).toBe(3);
  });

  it('ignores all-zero rows', () => {
    expect(scoreMemory(makeSample('memory', { '%memused': 0, kbavail: 0 }), t).score).toBe(0);
  });
});

describe('scoreDisk', () => {
  it('uses inclusive spike thresholds', () => {
    expect(scoreDisk(makeSample('disk', { await: 50 }, 'sda'), t).score).toBe(3);
    expect(scoreDisk(makeSample('disk', { await: 49.9 }, 'sda'), t).score).toBe(0);
    expect(scoreDisk(makeSample('disk', { '%util': 90 }, 'sda'), t).score).toBe(3);
    expect(scoreDisk(makeSample('disk', { '%util': 89.9 }, 'sda'), t).score).toBe(0);
    expect(scoreDisk(makeSample('disk', { 'aqu-sz': 5 }, 'sda'), t).score).toBe(2);
    expect(scoreDisk(makeSample('disk', { 'aqu-sz': 4.9 }, 'sda'), t).score).toBe(0);
    expect(scoreDisk(makeSample('disk', { await: 80, '%util': 95, 'aqu-sz': 7 }, 'sda'), t).score).toBe(8);
  });

  it('describes the device and its readings', () => {
    expect(scoreDisk(makeSample('disk', { await: 60, '%util': 10, 'aqu-sz': 0.5 }, 'sda'), t).description)
      .toBe('DEV=sda await=60.0ms util=10% aqu=0.50');
  });
});

describe('diskAverageWarnings', () => {
  it('warns on average await and utilization above the warn levels', () => {
    expect(diskAverageWarnings({ device: 'sda', await: 85 / 3, util: 75, aqu: 0 }, t)).toEqual([
      'sda avg await=28.3ms (>20ms)',
      'sda avg %util=75.0 (>70%)'
    ]);
    expect(diskAverageWarnings({ device: 'sdb', await: 20, util: 70, aqu: 0 }, t)).toEqual([]);
  });
});

describe('scoreNetLoad', () => {
  const sample = makeSample('net-dev', { 'rxkB/s': 100, 'txkB/s': 50 }, 'eth0');

  it('scores utilization at or above the warn level', () => {
    expect(scoreNetLoad(sample, 70, 1000, t)).toEqual({
      score: 2,
      description: 'IF=eth0 load=150.0kB/s ifutil=70.0%'
    });
    expect(scoreNetLoad(sample, 69.9, 1000, t).score).toBe(0);
  });

  it('never scores an interface without a configured link speed', () => {
    expect(scoreNetLoad(sample, 100, null, t).score).toBe(0);
  });
});

describe('scoreNetErrors', () => {
  it('scores errors and drops above the minimum', () => {
    expect(scoreNetErrors(makeSample('net-err', { 'rxerr/s': 0.5 }, 'eth0'), t)).toEqual({
      score: 3,
      description: 'IF=eth0 rxerr=0.5 txerr=0.0 rxdrop=0.0 txdrop=0.0'
    });
    expect(scoreNetErrors(makeSample('net-err', { 'txdrop/s': 1 }, 'eth0'), t).score).toBe(2);
    expect(scoreNetErrors(makeSample('net-err', { 'txerr/s': 1, 'rxdrop/s': 1 }, 'eth0'), t).score).toBe(5);
    expect(scoreNetErrors(makeSample('net-err', { 'rxerr/s': 0 }, 'eth0'), t).score).toBe(0);
  });

  it('honours a raised minimum for both rules', () => {
    const raised = { ...t, netErrMin: 2 };
    expect(scoreNetErrors(makeSample('net-err', { 'rxerr/s': 2, 'rxdrop/s': 2 }, 'eth0'), raised).score).toBe(0);
    expect(scoreNetErrors(makeSample('net-err', { 'rxerr/s': 2.5, 'rxdrop/s': 3 }, 'eth0'), raised).score).toBe(5);
  });
});

describe('protocol scorers', () => {
  it('flags sockets in TIME_WAIT', () => {
    expect(scoreSocket(makeSample('sock', { totsck: 200, tcpsck: 40, udpsck: 5, 'tcp-tw': 12 }))).toEqual({
      score: 1,
      description: 'SOCK tots=200 tcp=40 udp=5 tw=12'
    });
    expect(scoreSocket(makeSample('sock', { totsck: 200, 'tcp-tw': 0 })).score).toBe(0);
  });

  it('weights retransmits and input errors above connection churn', () => {
    expect(scoreTcp(makeSample('tcp', { 'active/s': 1, 'retrans/s': 0.2 })).score).toBe(5);
    expect(scoreTcp(makeSample('tcp', { inerr: 3 })).score).toBe(4);
    expect(scoreTcp(makeSample('tcp', { 'passive/s': 2 }))).toEqual({
      score: 1,
      description: 'TCP active/s=0.0 passive/s=2.0 retrans/s=0.0 estab=0 inerr=0.0'
    });
    expect(scoreTcp(makeSample('tcp', { estab: 10 })).score).toBe(0);
  });

  it('treats zero retransmits, errors and churn as quiet', () => {
    expect(scoreTcp(makeSample('tcp', { 'active/s': 0, 'passive/s': 0, 'retrans/s': 0, inerr: 0 })).score).toBe(0);
    expect(scoreTcp(makeSample('tcp', { 'retrans/s': 0.1 })).score).toBe(4);
    expect(scoreTcp(makeSample('tcp', { 'active/s': 0.1 })).score).toBe(1);
  });

  it('flags rejected datagrams and busy delivery', () => {
    expect(scoreIp(makeSample('ip', { 'irej/s': 1 })).score).toBe(3);
    expect(scoreIp(makeSample('ip', { 'irec/s': 1500, 'idel/s': 10 }))).toEqual({
      score: 1,
      description: 'IP irec/s=1500.0 idel/s=10.0 irej/s=0.0'
    });
    expect(scoreIp(makeSample('ip', { 'irec/s': 1000, 'idel/s': 10 })).score).toBe(0);
    expect(scoreIp(makeSample('ip', { 'irec/s': 1001, 'idel/s': 0 })).score).toBe(0);
    expect(scoreIp(makeSample('ip', { 'irej/s': 0 })).score).toBe(0);
    expect(scoreIp(makeSample('ip', { 'irej/s': 0.1 })).score).toBe(3);
  });
});
