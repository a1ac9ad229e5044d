import { ANOMALY_Z_THRESHOLD } from '../config/config';
import { metricSeries, type NumericKey } from './segments';
import { computeStats } from './statistics';

export type AnomalyDirection = 'spike' | 'drop';

export interface AnomalyRecord {
  timestamp: number;
  metric: string;
  value: number;
  zScore: number;
  direction: AnomalyDirection;
}

export interface AnomalyOptions {
  /** |z| must exceed this to be reported. */
  threshold?: number;
}

/**
 * Z-score outliers per metric over the whole series. Each metric gets its
 * own mean/stddev; a flat series (stddev 0) yields nothing.
 */
export function detectAnomalies<T extends { timestamp: number }>(
  samples: readonly T[],
  metrics: readonly NumericKey<T>[],
  { threshold = ANOMALY_Z_THRESHOLD }: AnomalyOptions = {},
): AnomalyRecord[] {
  const records: Array<AnomalyRecord & { order: number }> = [];

  metrics.forEach((metric, order) => {
    const series = metricSeries(samples, metric);
    const { mean, stddev, count } = computeStats(series);
    if (count < 2 || stddev === 0) return;

    samples.forEach((sample, i) => {
      const value = series[i];
      if (!Number.isFinite(value)) return;
      const zScore = (value - mean) / stddev;
      if (Math.abs(zScore) <= threshold) return;
      records.push({
        timestamp: sample.timestamp,
        metric,
        value,
        zScore,
        direction: value > mean ? 'spike' : 'drop',
        order,
      });
    });
  });

  return records
    .sort((a, b) => a.timestamp - b.timestamp || a.order - b.order)
    .map(({ order: _order, ...record }) => record);
}
