import type { ArcRun, ArcSample } from '../services/ArcstatCollector';
import type { PoolIostatRun, PoolIostatSample } from '../services/PoolIostatCollector';
import { bytesToGiB } from '../parsers/units';
import { detectAnomalies, type AnomalyRecord } from './anomalies';
import { analyzeIoSize, type IoSizeAnalysis } from './ioSize';
import { scaleLatencyStats, type ScaledLatencyStats } from './latencyScaler';
import {
  COOLDOWN_LABEL,
  Phase,
  WARMUP_LABEL,
  countPhases,
  isSteadyState,
} from './phase';
import {
  computeSegmentStats,
  groupBySegment,
  statsFor,
  type NumericKey,
  type SegmentStats,
} from './segments';
import type { Stats } from './statistics';

/* -------------------------------------------------------------------------------------------------
 * Metric groups
 * ------------------------------------------------------------------------------------------------- */

export const POOL_THROUGHPUT_METRICS: readonly NumericKey<PoolIostatSample>[] = [
  'readIOPS',
  'writeIOPS',
  'readBandwidthMBps',
  'writeBandwidthMBps',
];

export const POOL_LATENCY_METRICS: readonly NumericKey<PoolIostatSample>[] = [
  'readTotalWaitMs',
  'writeTotalWaitMs',
  'readDiskWaitMs',
  'writeDiskWaitMs',
  'readSyncQueueWaitMs',
  'writeSyncQueueWaitMs',
  'readAsyncQueueWaitMs',
  'writeAsyncQueueWaitMs',
];

export const POOL_ANOMALY_METRICS: readonly NumericKey<PoolIostatSample>[] = [
  ...POOL_THROUGHPUT_METRICS,
  'readTotalWaitMs',
  'writeTotalWaitMs',
];

export const ARC_CORE_METRICS: readonly NumericKey<ArcSample>[] = [
  'hitPct',
  'missPct',
  'arcSizeGiB',
  'readsPerSec',
  'hitsPerSec',
  'missesPerSec',
  'demandHitPct',
  'prefetchHitPct',
  'mfuPct',
  'mruPct',
  'zfetchHitPct',
];

export const ARC_L2ARC_METRICS: readonly NumericKey<ArcSample>[] = [
  'l2arcHitPct',
  'l2arcSizeGiB',
  'l2arcReadMBps',
];

const READ_SEGMENT_SUFFIX = '-read';

/* -------------------------------------------------------------------------------------------------
 * Types
 * ------------------------------------------------------------------------------------------------- */

export type LatencyBlock = Readonly<Record<string, ScaledLatencyStats>>;

export interface PoolRunSummary {
  poolName: string;
  layoutVersion: string;
  durationSec: number;
  restarts: number;
  incomplete: boolean;
  incompleteReason?: string;
  sampleCounts: {
    total: number;
    warmup: number;
    cooldown: number;
    steadyState: number;
    withWarnings: number;
  };
  phaseCounts: Record<Phase, number>;
  /** Throughput and latency over every captured sample. */
  allSamples: Readonly<Record<string, Stats>>;
  /** Same figures over non-IDLE samples only. */
  activeSamples: Readonly<Record<string, Stats>>;
  perSegment: readonly SegmentStats[];
  latency: {
    allSamples: LatencyBlock;
    perSegment: ReadonlyArray<{ segmentLabel: string; metrics: LatencyBlock }>;
  };
  ioSize: IoSizeAnalysis;
  capacity: {
    allocGiBStart: number;
    allocGiBEnd: number;
    freeGiBEnd: number;
  };
  anomalies: readonly AnomalyRecord[];
}

export interface ArcRunSummary {
  poolName: string;
  layoutVersion: string;
  hasL2ARC: boolean;
  durationSec: number;
  incomplete: boolean;
  incompleteReason?: string;
  totalSamples: number;
  readPhaseSamples: number;
  allSamples: Readonly<Record<string, Stats>>;
  readPhase: Readonly<Record<string, Stats>>;
  perSegmentRead: readonly SegmentStats[];
}

export interface SummaryOptions {
  anomalyThreshold?: number;
}

/* -------------------------------------------------------------------------------------------------
 * Helpers
 * ------------------------------------------------------------------------------------------------- */

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function latencyBlock(stats: Readonly<Record<string, Stats>>): LatencyBlock {
  const out: Record<string, ScaledLatencyStats> = {};
  for (const metric of POOL_LATENCY_METRICS) {
    const s = stats[metric];
    if (s) out[metric] = scaleLatencyStats(s);
  }
  return out;
}

/* -------------------------------------------------------------------------------------------------
 * Summaries
 * ------------------------------------------------------------------------------------------------- */

export function summarizePoolRun(
  run: PoolIostatRun,
  { anomalyThreshold }: SummaryOptions = {},
): PoolRunSummary {
  const samples = run.samples;
  const metrics = [...POOL_THROUGHPUT_METRICS, ...POOL_LATENCY_METRICS];
  const steady = samples.filter(s => isSteadyState(s));
  const active = samples.filter(s => s.phase !== Phase.IDLE);
  const perSegment = computeSegmentStats(samples, metrics);
  const allSamples = statsFor(samples, metrics);

  const first = samples[0];
  const last = samples[samples.length - 1];

  const summary: PoolRunSummary = {
    poolName: run.poolName,
    layoutVersion: run.layoutVersion,
    durationSec: run.durationSec,
    restarts: run.restarts,
    incomplete: run.incomplete,
    sampleCounts: {
      total: samples.length,
      warmup: samples.filter(s => s.segmentLabel === WARMUP_LABEL).length,
      cooldown: samples.filter(s => s.segmentLabel === COOLDOWN_LABEL).length,
      steadyState: steady.length,
      withWarnings: samples.filter(s => s.warnings.length > 0).length,
    },
    phaseCounts: countPhases(samples),
    allSamples,
    activeSamples: statsFor(active, metrics),
    perSegment,
    latency: {
      allSamples: latencyBlock(allSamples),
      perSegment: perSegment.map(seg => ({
        segmentLabel: seg.segmentLabel,
        metrics: latencyBlock(seg.metrics),
      })),
    },
    ioSize: analyzeIoSize(steady),
    capacity: {
      allocGiBStart: first ? bytesToGiB(first.allocBytes) : 0,
      allocGiBEnd: last ? bytesToGiB(last.allocBytes) : 0,
      freeGiBEnd: last ? bytesToGiB(last.freeBytes) : 0,
    },
    anomalies: detectAnomalies(steady, POOL_ANOMALY_METRICS, { threshold: anomalyThreshold }),
  };
  if (run.incompleteReason !== undefined) summary.incompleteReason = run.incompleteReason;
  return deepFreeze(summary);
}

/**
 * ARC figures only mean something while the benchmark reads, so besides
 * the all-samples view the summary narrows to `*-read` segments.
 */
export function summarizeArcRun(run: ArcRun): ArcRunSummary {
  const samples = run.samples;
  const metrics = run.hasL2ARC ? [...ARC_CORE_METRICS, ...ARC_L2ARC_METRICS] : ARC_CORE_METRICS;
  const readSamples = samples.filter(s => s.segmentLabel.endsWith(READ_SEGMENT_SUFFIX));

  const perSegmentRead: SegmentStats[] = [];
  for (const [segmentLabel, group] of groupBySegment(readSamples)) {
    perSegmentRead.push({
      segmentLabel,
      sampleCount: group.length,
      metrics: statsFor(group, metrics),
    });
  }

  const summary: ArcRunSummary = {
    poolName: run.poolName,
    layoutVersion: run.layoutVersion,
    hasL2ARC: run.hasL2ARC,
    durationSec: run.durationSec,
    incomplete: run.incomplete,
    totalSamples: samples.length,
    readPhaseSamples: readSamples.length,
    allSamples: statsFor(samples, metrics),
    readPhase: statsFor(readSamples, metrics),
    perSegmentRead,
  };
  if (run.incompleteReason !== undefined) summary.incompleteReason = run.incompleteReason;
  return deepFreeze(summary);
}
