// atop-report.ts - Text layout of the process-top aggregation
import { percentile } from '../analysis/statistics';
import { AtopConfig } from '../config/config';
import { describeWindow } from '../telemetry/window-filter';
import { TimeWindow } from '../types';
import { ATOP_METRICS, AtopMetric } from './atopsar-parser';
import { ProcessTopAggregator, RankedCommand } from './process-aggregator';

export const DAILY_SUMMARY_ROWS = 10;

export function spikeThreshold(config: AtopConfig, metric: AtopMetric): number {
  return config.spikeThresholds[metric];
}

function rankedRows(rows: RankedCommand[]): string[] {
  if (rows.length === 0) return ['(no data)'];
  return rows.map(r => `${String(r.rank).padStart(2)},${r.command},${r.sum.toFixed(2)}`);
}

/**
 * Hourly and daily TOP-N tables for every metric.
 */
export function renderTopTables(aggregator: ProcessTopAggregator, window: TimeWindow): string[] {
  const lines = [`===== TOP-${aggregator.limit} BY HOUR (${describeWindow(window)}) =====`];
  for (const metric of ATOP_METRICS) {
    for (const hour of aggregator.hours(metric)) {
      lines.push(`### Metric: ${metric}, hour ${hour}`, 'rank,cmd,sum');
      lines.push(...rankedRows(aggregator.topForHour(metric, hour)), '');
    }
  }

  lines.push(`===== TOP-${aggregator.limit} BY DAY (${describeWindow(window)}) =====`);
  for (const metric of ATOP_METRICS) {
    lines.push(`### Metric: ${metric}`, 'rank,cmd,sum');
    lines.push(...rankedRows(aggregator.topForDay(metric)), '');
  }
  return lines;
}

function renderMetricSummary(aggregator: ProcessTopAggregator, config: AtopConfig, metric: AtopMetric): string[] {
  const lines = [`== Metric: ${metric} ==`, 'Top entries by total (daily aggregation):'];
  const daily = aggregator.topForDay(metric, DAILY_SUMMARY_ROWS);
  lines.push(...(daily.length > 0 ? daily.map(r => `${r.rank},${r.command},${r.sum.toFixed(2)}`) : ['(no data)']));

  const leaders = aggregator.hourlyLeaders(metric);
  const sums = leaders.map(l => l.sum);
  const p95 = percentile(sums, 0.95);
  const p99 = percentile(sums, 0.99);
  if (p95 === null || p99 === null) {
    lines.push(`(no hourly data to compute percentiles for ${metric})`, '');
    return lines;
  }
  lines.push(`Top-1 hourly sum percentiles: 95% = ${p95.toFixed(2)}, 99% = ${p99.toFixed(2)}`);

  const threshold = spikeThreshold(config, metric);
  const spikes = leaders.filter(l => l.sum > threshold);
  if (spikes.length === 0) {
    lines.push(`No hourly spikes > ${threshold} found for ${metric}.`);
  } else {
    lines.push(`Hours with top-1 > ${threshold}:`);
    for (const spike of spikes) {
      lines.push(`  hour ${spike.hour}: ${spike.command} ${spike.sum.toFixed(2)}`);
    }
  }
  lines.push('');
  return lines;
}

export function renderAtopSummary(aggregator: ProcessTopAggregator, config: AtopConfig): string[] {
  return [
    'Detailed atop summary',
    `Window: ${describeWindow(config.window)}`,
    '',
    ...ATOP_METRICS.flatMap(metric => renderMetricSummary(aggregator, config, metric))
  ];
}
