import { SCALING_DIMINISHING_PCT, SCALING_PRIOR_GAIN_PCT } from '../config/config';

/** Per thread-count averages reported by the benchmark driver. */
export interface ScalingInput {
  threads: number;
  avgWriteSpeed: number;
  avgReadSpeed: number;
}

export interface ScalingPoint {
  threads: number;
  speedMBps: number;
}

export interface ScalingDelta {
  fromThreads: number;
  toThreads: number;
  deltaSpeed: number;
  /** (next - prev) / prev * 100; 0 when prev is 0. */
  percentChange: number;
}

export interface ProgressionPoint extends ScalingPoint {
  /** speed relative to the lowest thread count; 0 when that speed is 0 */
  vsSingleThread: number;
}

export type ScalingObservation =
  | { kind: 'negative-scaling'; fromThreads: number; toThreads: number; percentChange: number }
  | {
      kind: 'diminishing-returns';
      aboveThreads: number;
      percentChange: number;
      priorPercentChange: number;
    };

export interface DirectionScaling {
  points: ScalingPoint[];
  peakSpeed: number;
  peakThreads: number;
  /** peak speed / peak thread count, MB/s per thread */
  threadEfficiency: number;
  progression: ProgressionPoint[];
  deltas: ScalingDelta[];
  positiveTransitions: number;
  negativeTransitions: number;
  observations: ScalingObservation[];
}

export interface ScalingAnalysis {
  write: DirectionScaling;
  read: DirectionScaling;
}

export interface ScalingOptions {
  /** positive transitions below this percent count as diminishing */
  diminishingReturnsPct?: number;
  /** ...when the transition before them gained at least this much */
  priorGainPct?: number;
}

export const percentChange = (prev: number, next: number): number =>
  prev === 0 ? 0 : ((next - prev) / prev) * 100;

export function analyzeDirection(
  points: readonly ScalingPoint[],
  {
    diminishingReturnsPct = SCALING_DIMINISHING_PCT,
    priorGainPct = SCALING_PRIOR_GAIN_PCT,
  }: ScalingOptions = {},
): DirectionScaling {
  const sorted = points.slice().sort((a, b) => a.threads - b.threads);

  let peak: ScalingPoint | undefined;
  for (const p of sorted) {
    if (!peak || p.speedMBps > peak.speedMBps) peak = p;
  }
  const peakSpeed = peak ? peak.speedMBps : 0;
  const peakThreads = peak ? peak.threads : 0;

  const base = sorted.length ? sorted[0].speedMBps : 0;
  const progression = sorted.map(p => ({
    ...p,
    vsSingleThread: base === 0 ? 0 : p.speedMBps / base,
  }));

  const deltas: ScalingDelta[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const next = sorted[i];
    deltas.push({
      fromThreads: prev.threads,
      toThreads: next.threads,
      deltaSpeed: next.speedMBps - prev.speedMBps,
      percentChange: percentChange(prev.speedMBps, next.speedMBps),
    });
  }

  const observations: ScalingObservation[] = [];
  deltas.forEach((d, i) => {
    if (d.deltaSpeed < 0) {
      observations.push({
        kind: 'negative-scaling',
        fromThreads: d.fromThreads,
        toThreads: d.toThreads,
        percentChange: d.percentChange,
      });
      return;
    }
    const prior = deltas[i - 1];
    if (
      d.deltaSpeed > 0 &&
      prior &&
      d.percentChange < diminishingReturnsPct &&
      prior.percentChange >= priorGainPct
    ) {
      observations.push({
        kind: 'diminishing-returns',
        aboveThreads: d.fromThreads,
        percentChange: d.percentChange,
        priorPercentChange: prior.percentChange,
      });
    }
  });

  return {
    points: sorted,
    peakSpeed,
    peakThreads,
    threadEfficiency: peakThreads > 0 ? peakSpeed / peakThreads : 0,
    progression,
    deltas,
    positiveTransitions: deltas.filter(d => d.deltaSpeed > 0).length,
    negativeTransitions: deltas.filter(d => d.deltaSpeed < 0).length,
    observations,
  };
}

/**
 * Write and read scaling across thread counts. Descriptive only: peaks,
 * deltas and neutral observations for the reporting layer.
 */
export function analyzeScaling(
  inputs: readonly ScalingInput[],
  options: ScalingOptions = {},
): ScalingAnalysis {
  const byThreads = inputs.slice().sort((a, b) => a.threads - b.threads);
  return {
    write: analyzeDirection(
      byThreads.map(r => ({ threads: r.threads, speedMBps: r.avgWriteSpeed })),
      options,
    ),
    read: analyzeDirection(
      byThreads.map(r => ({ threads: r.threads, speedMBps: r.avgReadSpeed })),
      options,
    ),
  };
}

export function describeObservation(o: ScalingObservation): string {
  switch (o.kind) {
    case 'negative-scaling':
      return `${o.fromThreads}T -> ${o.toThreads}T changed by ${o.percentChange.toFixed(1)}%`;
    case 'diminishing-returns':
      return `above ${o.aboveThreads}T gains fall to ${o.percentChange.toFixed(1)}% after ${o.priorPercentChange.toFixed(1)}%`;
  }
}
