import { isSteadyState, type PhaseTagged, type SteadyStateOptions } from './phase';
import { computeStats, type Stats } from './statistics';

/** Keys of T holding numbers (optional numeric keys included). */
export type NumericKey<T> = {
  [K in keyof T]-?: T[K] extends number | undefined ? K : never;
}[keyof T] &
  string;

/** Values of one metric; absent values become NaN and are ignored by computeStats. */
export function metricSeries<T>(samples: readonly T[], metric: NumericKey<T>): number[] {
  return samples.map(s => {
    const v: unknown = s[metric];
    return typeof v === 'number' ? v : NaN;
  });
}

export interface SegmentStats {
  segmentLabel: string;
  sampleCount: number;
  metrics: Readonly<Record<string, Stats>>;
}

export interface SegmentStatsOptions extends SteadyStateOptions {
  /** Keep only steady-state samples before grouping. Defaults to true. */
  steadyStateOnly?: boolean;
}

/** Groups by label in first-seen order. */
export function groupBySegment<T extends { segmentLabel: string }>(
  samples: readonly T[],
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const s of samples) {
    const group = groups.get(s.segmentLabel);
    if (group) group.push(s);
    else groups.set(s.segmentLabel, [s]);
  }
  return groups;
}

export function statsFor<T>(
  samples: readonly T[],
  metrics: readonly NumericKey<T>[],
): Readonly<Record<string, Stats>> {
  const out: Record<string, Stats> = {};
  for (const metric of metrics) {
    out[metric] = Object.freeze(computeStats(metricSeries(samples, metric)));
  }
  return Object.freeze(out);
}

export function computeSegmentStats<T extends PhaseTagged>(
  samples: readonly T[],
  metrics: readonly NumericKey<T>[],
  { steadyStateOnly = true, excludeIdle = true }: SegmentStatsOptions = {},
): readonly SegmentStats[] {
  const kept = steadyStateOnly
    ? samples.filter(s => isSteadyState(s, { excludeIdle }))
    : samples;

  const result: SegmentStats[] = [];
  for (const [segmentLabel, group] of groupBySegment(kept)) {
    result.push(
      Object.freeze({
        segmentLabel,
        sampleCount: group.length,
        metrics: statsFor(group, metrics),
      }),
    );
  }
  return Object.freeze(result);
}
