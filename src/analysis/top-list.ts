// top-list.ts - Bounded rankings of the worst observations, per subsystem and merged
import { Candidate, Subsystem, SUBSYSTEMS } from '../types';

/**
 * Score descending, then earlier timestamp first. Timestamps are
 * `YYYY-MM-DD HH:MM:SS ...` so string order is time order.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.timestamp < b.timestamp) return -1;
  if (a.timestamp > b.timestamp) return 1;
  return 0;
}

export class TopList {
  private items: Candidate[] = [];
  public readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`TopList capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Insert keeping order; full ties keep insertion order. Returns false when
   * the candidate did not make the list.
   */
  public offer(candidate: Candidate): boolean {
    if (candidate.score <= 0) return false;

    // first position whose entry ranks strictly after the candidate
    let lo = 0;
    let hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareCandidates(this.items[mid], candidate) <= 0) lo = mid + 1;
      else hi = mid;
    }

    if (lo >= this.capacity) return false;

    this.items.splice(lo, 0, candidate);
    if (this.items.length > this.capacity) this.items.length = this.capacity;
    return true;
  }

  public entries(): readonly Candidate[] {
    return this.items;
  }

  public get size(): number {
    return this.items.length;
  }

  public isEmpty(): boolean {
    return this.items.length === 0;
  }
}

/**
 * Re-rank the union of several lists into one bounded list. Scores are taken
 * as-is; nothing is re-scored.
 */
export function mergeTopLists(lists: readonly TopList[], capacity: number): TopList {
  const merged = new TopList(capacity);
  for (const list of lists) {
    for (const candidate of list.entries()) merged.offer(candidate);
  }
  return merged;
}

export class TopKRanker {
  private bySubsystem: Map<Subsystem, TopList> = new Map();
  private merged: TopList;
  private offered = 0;

  constructor(public readonly capacity: number) {
    for (const subsystem of SUBSYSTEMS) {
      this.bySubsystem.set(subsystem, new TopList(capacity));
    }
    this.merged = new TopList(capacity);
  }

  public offer(subsystem: Subsystem, candidate: Candidate): void {
    if (candidate.score <= 0) return;
    this.offered++;
    this.list(subsystem).offer(candidate);
    this.merged.offer(candidate);
  }

  public list(subsystem: Subsystem): TopList {
    const list = this.bySubsystem.get(subsystem);
    if (!list) {
      throw new Error(`Unknown subsystem: ${subsystem}`);
    }
    return list;
  }

  public global(): TopList {
    return this.merged;
  }

  public get offeredCount(): number {
    return this.offered;
  }
}
