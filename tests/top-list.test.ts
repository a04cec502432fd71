import { compareCandidates, mergeTopLists, TopKRanker, TopList } from '../src/analysis/top-list';
import { Candidate } from '../src/types';

const at = (score: number, time: string, description = `s${score}@${time}`): Candidate => ({
  score,
  timestamp: `2024-03-05 ${time} UTC`,
  description
});

describe('compareCandidates', () => {
  it('orders by score descending, then earlier timestamp', () => {
    expect(compareCandidates(at(5, '10:00:00'), at(3, '09:00:00'))).toBeLessThan(0);
    expect(compareCandidates(at(3, '09:00:00'), at(3, '10:00:00'))).toBeLessThan(0);
    expect(compareCandidates(at(3, '09:00:00'), at(3, '09:00:00'))).toBe(0);
  });
});

describe('TopList', () => {
  it('keeps at most capacity entries, best first', () => {
    const list = new TopList(3);
    [at(2, '08:10:00'), at(7, '08:20:00'), at(4, '08:30:00'), at(1, '08:40:00'), at(5, '08:50:00')]
      .forEach(c => list.offer(c));

    expect(list.entries().map(c => c.score)).toEqual([7, 5, 4]);
    expect(list.size).toBe(3);
  });

  it('puts the earlier sample first on equal scores', () => {
    const list = new TopList(5);
    list.offer(at(3, '12:00:00'));
    list.offer(at(3, '09:00:00'));
    list.offer(at(3, '10:30:00'));

    expect(list.entries().map(c => c.timestamp)).toEqual([
      '2024-03-05 09:00:00 UTC',
      '2024-03-05 10:30:00 UTC',
      '2024-03-05 12:00:00 UTC'
    ]);
  });

  it('keeps insertion order for full ties', () => {
    const list = new TopList(5);
    list.offer(at(3, '09:00:00', 'first'));
    list.offer(at(3, '09:00:00', 'second'));

    expect(list.entries().map(c => c.description)).toEqual(['first', 'second']);
  });

  it('rejects zero scores and entries that rank past a full list', () => {
    const list = new TopList(1);
    expect(list.offer(at(0, '08:00:00'))).toBe(false);
    expect(list.isEmpty()).toBe(true);

    expect(list.offer(at(4, '08:00:00'))).toBe(true);
    expect(list.offer(at(4, '09:00:00'))).toBe(false);
    expect(list.offer(at(6, '10:00:00'))).toBe(true);
    expect(list.entries().map(c => c.score)).toEqual([6]);
  });

  it('requires a positive integer capacity', () => {
    expect(() => new TopList(0)).toThrow(RangeError);
    expect(() => new TopList(1.5)).toThrow(RangeError);
  });
});

describe('mergeTopLists', () => {
  it('re-ranks the union without re-scoring', () => {
    const a = new TopList(3);
    const b = new TopList(3);
    a.offer(at(3, '08:00:00'));
    a.offer(at(8, '09:00:00'));
    b.offer(at(5, '08:30:00'));
    b.offer(at(3, '07:00:00'));

    const merged = mergeTopLists([a, b], 3);
    expect(merged.entries().map(c => c.description)).toEqual(['s8@09:00:00', 's5@08:30:00', 's3@07:00:00']);
  });
});

describe('TopKRanker', () => {
  it('ranks per subsystem and across subsystems', () => {
    const ranker = new TopKRanker(2);
    ranker.offer('cpu', at(2, '08:10:00', 'cpu-a'));
    ranker.offer('cpu', at(4, '08:20:00', 'cpu-b'));
    ranker.offer('disk', at(3, '08:05:00', 'disk-a'));
    ranker.offer('tcp', at(0, '08:00:00', 'tcp-zero'));

    expect(ranker.list('cpu').entries().map(c => c.description)).toEqual(['cpu-b', 'cpu-a']);
    expect(ranker.list('disk').entries().map(c => c.description)).toEqual(['disk-a']);
    expect(ranker.list('tcp').isEmpty()).toBe(true);
    expect(ranker.global().entries().map(c => c.description)).toEqual(['cpu-b', 'disk-a']);
    expect(ranker.offeredCount).toBe(3);
  });
});
