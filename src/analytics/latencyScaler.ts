import { type Stats } from './statistics';

export type LatencyUnit = 'ms' | 'us';

export interface ScaledLatencyStats extends Stats {
  unit: LatencyUnit;
}

const VALUE_FIGURES = [
  'mean',
  'median',
  'min',
  'max',
  'stddev',
  'p50',
  'p75',
  'p90',
  'p95',
  'p99',
] as const;

/**
 * Picks the presentation unit for one latency block from its mean (input in
 * milliseconds). Sub-millisecond blocks are re-expressed in microseconds as a
 * whole; count and CV% carry no unit and stay as they are.
 */
export function scaleLatencyStats(stats: Stats): ScaledLatencyStats {
  if (stats.mean >= 1) return { ...stats, unit: 'ms' };
  const scaled: ScaledLatencyStats = { ...stats, unit: 'us' };
  for (const key of VALUE_FIGURES) scaled[key] = stats[key] * 1000;
  return scaled;
}

export function formatLatency(value: number, unit: LatencyUnit, digits = 2): string {
  return `${value.toFixed(digits)} ${unit === 'us' ? 'μs' : 'ms'}`;
}
