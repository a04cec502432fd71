// statistics.ts - Means and nearest-rank percentiles over metric series

/**
 * Arithmetic mean; null for an empty series.
 */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Nearest-rank percentile: sort ascending, take the value at 1-based rank
 * ceil(p * n) clamped to [1, n]. The result is always an observed sample.
 */
export function percentile(values: readonly number[], p: number): number | null {
  if (!(p > 0 && p <= 1)) {
    throw new RangeError(`percentile p must be in (0, 1], got ${p}`);
  }
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  const rank = Math.min(n, Math.max(1, Math.ceil(p * n)));
  return sorted[rank - 1];
}

export class MetricSeries {
  private values: number[] = [];

  push(value: number): void {
    this.values.push(value);
  }

  mean(): number | null {
    return mean(this.values);
  }

  percentile(p: number): number | null {
    return percentile(this.values, p);
  }

  max(): number | null {
    if (this.values.length === 0) return null;
    return this.values.reduce((a, b) => (b > a ? b : a));
  }
}
