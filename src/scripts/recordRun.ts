/*
 Drives both collectors through a fixed segment schedule and stores the raw runs plus
 their analytics under <outDir>/<timestamp>/:
 - pool-iostat.json: PoolIostatRun
 - arcstat.json:     ArcRun (skipped with --no-arc)
 - analytics.json:   summaries (and the scaling analysis when driver results are given)
*/
import {
  TELEMETRY_COOLDOWN_SAMPLES,
  TELEMETRY_INTERVAL_SEC,
  TELEMETRY_OUTPUT_DIR,
  TELEMETRY_WARMUP_SAMPLES,
} from '../config/config';
import { ValidationError, errorMessage } from '../errors/CustomError';
import fs from 'fs-extra';
import path from 'node:path';
import {
  summarizeArcRun,
  summarizePoolRun,
  type ArcRunSummary,
  type PoolRunSummary,
} from '../analytics/runSummary';
import { isReservedLabel } from '../analytics/phase';
import { analyzeScaling, type ScalingAnalysis, type ScalingInput } from '../analytics/scaling';
import { ArcstatCollector, type ArcRun } from '../services/ArcstatCollector';
import { PoolIostatCollector, type PoolIostatRun } from '../services/PoolIostatCollector';
import type { SpawnSource } from '../services/TelemetryCollector';
import { detectL2arc, type RunCommand } from '../services/topology';
import { assertArcRun, assertPoolIostatRun, assertScalingInputs } from './recordingSchema';

export const POOL_FILE = 'pool-iostat.json';
export const ARC_FILE = 'arcstat.json';
export const ANALYTICS_FILE = 'analytics.json';

export interface SegmentStep {
  label: string;
  durationSec: number;
}

export interface RecordOptions {
  poolName: string;
  segments: SegmentStep[];
  intervalSec?: number;
  warmup?: number;
  cooldown?: number;
  outDir?: string;
  /** Collect arcstat alongside zpool iostat (default true). */
  arc?: boolean;
  spawn?: SpawnSource;
  /** Runner for the `zpool status` L2ARC check. */
  statusCommand?: RunCommand;
  sleep?: (ms: number) => Promise<void>;
  restartDelayMs?: number;
  killGraceMs?: number;
}

export interface RecordingAnalytics {
  generatedAt: string;
  pool: PoolRunSummary;
  arc: ArcRunSummary | null;
  scaling: ScalingAnalysis | null;
}

export interface RecordResult {
  outDir: string;
  pool: PoolIostatRun;
  arc: ArcRun | null;
  analytics: RecordingAnalytics;
}

function sleep(ms: number) {
  return new Promise<void>(resolve => setTimeout(resolve, ms));
}

/** "1T-write:30,1T-read:30" -> [{label:'1T-write', durationSec:30}, ...] */
export function parseSegmentSchedule(raw: string): SegmentStep[] {
  const steps: SegmentStep[] = [];
  const details: { field: string; message: string }[] = [];
  raw
    .split(',')
    .map(s => s.trim())
    .filter(Boolean)
    .forEach((entry, i) => {
      const sep = entry.lastIndexOf(':');
      const label = sep > 0 ? entry.slice(0, sep).trim() : '';
      const durationSec = Number(sep > 0 ? entry.slice(sep + 1) : NaN);
      if (!label || !Number.isFinite(durationSec) || durationSec <= 0) {
        details.push({ field: `segments[${i}]`, message: `expected <label>:<seconds>, got "${entry}"` });
        return;
      }
      if (isReservedLabel(label)) {
        details.push({ field: `segments[${i}]`, message: `label "${label}" is reserved` });
        return;
      }
      steps.push({ label, durationSec });
    });
  if (details.length) throw new ValidationError('Invalid segment schedule', details);
  if (!steps.length) throw new ValidationError('Segment schedule is empty');
  return steps;
}

export function buildAnalytics(
  pool: PoolIostatRun,
  arc: ArcRun | null,
  scalingInputs?: readonly ScalingInput[],
): RecordingAnalytics {
  return {
    generatedAt: new Date().toISOString(),
    pool: summarizePoolRun(pool),
    arc: arc ? summarizeArcRun(arc) : null,
    scaling: scalingInputs ? analyzeScaling(scalingInputs) : null,
  };
}

async function writeRecording(
  outDir: string,
  pool: PoolIostatRun,
  arc: ArcRun | null,
  analytics: RecordingAnalytics,
) {
  await fs.mkdirp(outDir);
  await fs.writeJSON(path.join(outDir, POOL_FILE), pool, { spaces: 2 });
  if (arc) await fs.writeJSON(path.join(outDir, ARC_FILE), arc, { spaces: 2 });
  await fs.writeJSON(path.join(outDir, ANALYTICS_FILE), analytics, { spaces: 2 });
}

export async function recordRun(opts: RecordOptions): Promise<RecordResult> {
  const intervalSec = opts.intervalSec ?? TELEMETRY_INTERVAL_SEC;
  const warmup = opts.warmup ?? TELEMETRY_WARMUP_SAMPLES;
  const cooldown = opts.cooldown ?? TELEMETRY_COOLDOWN_SAMPLES;
  const wait = opts.sleep ?? sleep;
  const common = {
    intervalSec,
    spawn: opts.spawn,
    restartDelayMs: opts.restartDelayMs,
    killGraceMs: opts.killGraceMs,
  };

  const pool = new PoolIostatCollector(opts.poolName, common);
  let arc: ArcstatCollector | null = null;
  if (opts.arc !== false) {
    const hasL2ARC = await detectL2arc(opts.poolName, opts.statusCommand);
    console.log(
      `[telemetry] ${hasL2ARC ? 'L2ARC detected' : 'No L2ARC'} on pool '${opts.poolName}'`,
    );
    arc = new ArcstatCollector({ ...common, poolName: opts.poolName, hasL2ARC });
  }

  const collectors: Array<PoolIostatCollector | ArcstatCollector> = arc ? [pool, arc] : [pool];
  const started = await Promise.allSettled(collectors.map(c => c.start(warmup)));
  const live = collectors.filter((c, i) => {
    const outcome = started[i];
    if (outcome.status === 'fulfilled') return true;
    console.warn(`[telemetry] ${errorMessage(outcome.reason)}; continuing without it`);
    return false;
  });

  try {
    for (const step of opts.segments) {
      if (!live.length) break;
      console.log(`[telemetry] Segment ${step.label} (${step.durationSec}s)`);
      for (const c of live) c.segment(step.label);
      await wait(step.durationSec * 1000);
    }
  } catch (err) {
    // both tools are stopped before the failure propagates
    console.error(`[telemetry] Schedule aborted: ${errorMessage(err)}`);
    await Promise.allSettled(collectors.map(c => c.stop(0)));
    throw err;
  }

  const [poolRun, arcRun] = await Promise.all([
    pool.stop(cooldown),
    arc ? arc.stop(cooldown) : Promise.resolve(null),
  ]);

  const analytics = buildAnalytics(poolRun, arcRun);
  const ts = new Date(poolRun.startedAt).toISOString().replace(/[:.]/g, '-');
  const outDir = path.resolve(opts.outDir ?? TELEMETRY_OUTPUT_DIR, ts);
  await writeRecording(outDir, poolRun, arcRun, analytics);
  console.log(`[telemetry] Wrote ${poolRun.samples.length} pool samples to ${outDir}`);

  return { outDir, pool: poolRun, arc: arcRun, analytics };
}

/**
 * Recomputes analytics.json from recorded runs, adding the scaling analysis
 * when a driver results file (array of {threads, avgWriteSpeed, avgReadSpeed}) is given.
 */
export async function analyzeRecording(
  dir: string,
  scalingFile?: string,
): Promise<RecordingAnalytics> {
  const poolPath = path.join(dir, POOL_FILE);
  if (!(await fs.pathExists(poolPath))) {
    throw new ValidationError(`No ${POOL_FILE} in ${dir}`);
  }
  const pool = assertPoolIostatRun(await fs.readJSON(poolPath));

  const arcPath = path.join(dir, ARC_FILE);
  const arc = (await fs.pathExists(arcPath))
    ? assertArcRun(await fs.readJSON(arcPath))
    : null;

  const scaling = scalingFile
    ? assertScalingInputs(await fs.readJSON(scalingFile))
    : undefined;

  const analytics = buildAnalytics(pool, arc, scaling);
  await fs.writeJSON(path.join(dir, ANALYTICS_FILE), analytics, { spaces: 2 });
  return analytics;
}
