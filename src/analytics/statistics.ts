export interface Stats {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
  /** Sample standard deviation (n - 1). */
  stddev: number;
  p50: number;
  p75: number;
  p90: number;
  p95: number;
  p99: number;
  /** stddev / mean * 100; 0 when the mean is 0 (see cvUndefined). */
  cvPercent: number;
  cvUndefined: boolean;
}

export const EMPTY_STATS: Readonly<Stats> = Object.freeze({
  count: 0,
  mean: 0,
  median: 0,
  min: 0,
  max: 0,
  stddev: 0,
  p50: 0,
  p75: 0,
  p90: 0,
  p95: 0,
  p99: 0,
  cvPercent: 0,
  cvUndefined: true,
});

const maxAbs = (a: readonly number[]) => a.reduce((m, v) => Math.max(m, Math.abs(v)), 0);

export function mean(a: readonly number[]): number {
  if (!a.length) return 0;
  const sum = a.reduce((x, y) => x + y, 0);
  if (Number.isFinite(sum)) return sum / a.length;
  // the sum overflowed: average relative to the largest magnitude
  const scale = maxAbs(a);
  return (a.reduce((acc, v) => acc + v / scale, 0) / a.length) * scale;
}

export const variance = (a: readonly number[], mu: number) =>
  a.length > 1
    ? a.reduce((acc, v) => acc + (v - mu) * (v - mu), 0) / (a.length - 1)
    : 0;

export function stddev(a: readonly number[]): number {
  if (a.length < 2) return 0;
  const mu = mean(a);
  const sd = Math.sqrt(variance(a, mu));
  if (Number.isFinite(sd)) return sd;
  // squared deviations overflowed: normalize them first
  const deviations = a.map(v => v - mu);
  const scale = maxAbs(deviations);
  return scale * Math.sqrt(variance(deviations.map(d => d / scale), 0));
}

/**
 * Linear interpolation between order statistics at index p/100 * (n - 1).
 * `sorted` must be ascending.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (!sorted.length) return 0;
  const idx = (Math.min(100, Math.max(0, p)) / 100) * (sorted.length - 1);
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (idx - lo);
}

export function computeStats(values: readonly number[]): Stats {
  const finite = values.filter(v => Number.isFinite(v));
  if (!finite.length) return { ...EMPTY_STATS };

  const sorted = finite.slice().sort((x, y) => x - y);
  const constant = sorted[0] === sorted[sorted.length - 1];
  // a constant series has no spread, whatever rounding the mean picked up
  const mu = constant ? sorted[0] : mean(sorted);
  const sd = constant ? 0 : stddev(sorted);
  const cvUndefined = mu === 0;
  const median = percentile(sorted, 50);

  return {
    count: sorted.length,
    mean: mu,
    median,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    stddev: sd,
    p50: median,
    p75: percentile(sorted, 75),
    p90: percentile(sorted, 90),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    cvPercent: cvUndefined ? 0 : (sd / mu) * 100,
    cvUndefined,
  };
}
