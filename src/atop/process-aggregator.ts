// process-aggregator.ts - Hourly and daily per-command sums for each atop metric
import { AtopMetric, ProcessEntry } from './atopsar-parser';

export interface RankedCommand {
  rank: number;
  command: string;
  sum: number;
}

export interface HourlyLeader {
  hour: string;
  command: string;
  sum: number;
}

type Sums = Map<string, number>;

function addTo(sums: Sums, command: string, value: number): void {
  sums.set(command, (sums.get(command) ?? 0) + value);
}

// descending by sum; equal sums keep first-seen order
function rank(sums: Sums | undefined, limit: number): RankedCommand[] {
  if (!sums) return [];
  return [...sums.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([command, sum], index) => ({ rank: index + 1, command, sum }));
}

export class ProcessTopAggregator {
  private hourly = new Map<AtopMetric, Map<string, Sums>>();
  private daily = new Map<AtopMetric, Sums>();

  constructor(public readonly limit: number = 20) {}

  public add(metric: AtopMetric, entry: ProcessEntry): void {
    let byHour = this.hourly.get(metric);
    if (!byHour) {
      byHour = new Map();
      this.hourly.set(metric, byHour);
    }
    let hourSums = byHour.get(entry.hour);
    if (!hourSums) {
      hourSums = new Map();
      byHour.set(entry.hour, hourSums);
    }
    addTo(hourSums, entry.command, entry.value);

    let daySums = this.daily.get(metric);
    if (!daySums) {
      daySums = new Map();
      this.daily.set(metric, daySums);
    }
    addTo(daySums, entry.command, entry.value);
  }

  public addAll(metric: AtopMetric, entries: readonly ProcessEntry[]): void {
    for (const entry of entries) this.add(metric, entry);
  }

  /** Hours with any data, ascending. */
  public hours(metric: AtopMetric): string[] {
    const byHour = this.hourly.get(metric);
    return byHour ? [...byHour.keys()].sort() : [];
  }

  public topForHour(metric: AtopMetric, hour: string, limit: number = this.limit): RankedCommand[] {
    return rank(this.hourly.get(metric)?.get(hour), limit);
  }

  public topForDay(metric: AtopMetric, limit: number = this.limit): RankedCommand[] {
    return rank(this.daily.get(metric), limit);
  }

  /** Rank-1 command of every hour with data. */
  public hourlyLeaders(metric: AtopMetric): HourlyLeader[] {
    const leaders: HourlyLeader[] = [];
    for (const hour of this.hours(metric)) {
      const [top] = this.topForHour(metric, hour, 1);
      if (top) leaders.push({ hour, command: top.command, sum: top.sum });
    }
    return leaders;
  }
}
