/*
 Shape checks for recording files read back by `telemetry analyze`.
 Files are written by recordRun(); anything else is rejected with a ValidationError
 listing the first offending fields.
*/
import { ValidationError, type ErrorDetail } from '../errors/CustomError';
import { PHASES } from '../analytics/phase';
import type { ScalingInput } from '../analytics/scaling';
import {
  ARCSTAT_CORE_COLUMNS,
  ARCSTAT_L2ARC_COLUMNS,
  ARCSTAT_ZFETCH_COLUMNS,
} from '../parsers/arcstatParser';
import { ZPOOL_IOSTAT_LAYOUT_V1 } from '../parsers/poolIostatParser';
import type { ArcRun } from '../services/ArcstatCollector';
import type { PoolIostatRun } from '../services/PoolIostatCollector';

const MAX_DETAILS = 10;

type UnknownRecord = Record<string, unknown>;

const isRecord = (v: unknown): v is UnknownRecord =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

const phaseNames: ReadonlySet<unknown> = new Set<unknown>(PHASES);

class Checker {
  readonly details: ErrorDetail[] = [];

  fail(field: string, message: string) {
    if (this.details.length < MAX_DETAILS) this.details.push({ field, message });
  }

  number(obj: UnknownRecord, key: string, at: string) {
    if (!isNumber(obj[key])) this.fail(`${at}.${key}`, 'expected a number');
  }

  string(obj: UnknownRecord, key: string, at: string) {
    if (typeof obj[key] !== 'string') this.fail(`${at}.${key}`, 'expected a string');
  }

  boolean(obj: UnknownRecord, key: string, at: string) {
    if (typeof obj[key] !== 'boolean') this.fail(`${at}.${key}`, 'expected a boolean');
  }

  throwIfFailed(what: string) {
    if (this.details.length) {
      throw new ValidationError(`Invalid ${what}`, this.details);
    }
  }
}

function checkRunHeader(c: Checker, run: UnknownRecord, source: string): unknown[] {
  if (run.source !== source) c.fail('source', `expected "${source}"`);
  for (const key of ['layoutVersion', 'startedAtIso', 'finishedAtIso', 'poolName']) {
    c.string(run, key, 'run');
  }
  for (const key of [
    'intervalSec',
    'startedAt',
    'finishedAt',
    'durationSec',
    'warmupCount',
    'cooldownCount',
    'restarts',
  ]) {
    c.number(run, key, 'run');
  }
  c.boolean(run, 'incomplete', 'run');
  if (run.incompleteReason !== undefined) c.string(run, 'incompleteReason', 'run');
  if (!Array.isArray(run.samples)) {
    c.fail('run.samples', 'expected an array');
    return [];
  }
  return run.samples;
}

function checkSampleMeta(c: Checker, s: UnknownRecord, at: string) {
  c.number(s, 'timestamp', at);
  c.string(s, 'timestampIso', at);
  c.string(s, 'segmentLabel', at);
  if (!phaseNames.has(s.phase)) c.fail(`${at}.phase`, 'unknown phase');
  if (!Array.isArray(s.warnings) || !s.warnings.every(w => typeof w === 'string')) {
    c.fail(`${at}.warnings`, 'expected an array of strings');
  }
}

export function assertPoolIostatRun(value: unknown): PoolIostatRun {
  const c = new Checker();
  if (!isRecord(value)) throw new ValidationError('Invalid pool iostat run: not an object');
  const samples = checkRunHeader(c, value, 'zpool-iostat');
  samples.forEach((s, i) => {
    const at = `samples[${i}]`;
    if (!isRecord(s)) return c.fail(at, 'expected an object');
    checkSampleMeta(c, s, at);
    c.string(s, 'poolName', at);
    for (const [field] of ZPOOL_IOSTAT_LAYOUT_V1.columns) c.number(s, field, at);
  });
  c.throwIfFailed('pool iostat run');
  return toPoolRun(value);
}

export function assertArcRun(value: unknown): ArcRun {
  const c = new Checker();
  if (!isRecord(value)) throw new ValidationError('Invalid arcstat run: not an object');
  const samples = checkRunHeader(c, value, 'arcstat');
  c.boolean(value, 'hasL2ARC', 'run');
  const columns = [
    ...ARCSTAT_CORE_COLUMNS,
    ...(value.hasL2ARC === true ? ARCSTAT_L2ARC_COLUMNS : []),
    ...ARCSTAT_ZFETCH_COLUMNS,
  ];
  samples.forEach((s, i) => {
    const at = `samples[${i}]`;
    if (!isRecord(s)) return c.fail(at, 'expected an object');
    checkSampleMeta(c, s, at);
    for (const [, key] of columns) c.number(s, key, at);
    c.number(s, 'zfetchHitPct', at);
  });
  c.throwIfFailed('arcstat run');
  return toArcRun(value);
}

export function assertScalingInputs(value: unknown): ScalingInput[] {
  const c = new Checker();
  if (!Array.isArray(value)) throw new ValidationError('Scaling results must be an array');
  const out: ScalingInput[] = [];
  value.forEach((entry, i) => {
    const at = `[${i}]`;
    if (!isRecord(entry)) return c.fail(at, 'expected an object');
    const { threads, avgWriteSpeed, avgReadSpeed } = entry;
    if (!isNumber(threads) || threads <= 0) return c.fail(`${at}.threads`, 'expected a positive number');
    if (!isNumber(avgWriteSpeed)) return c.fail(`${at}.avgWriteSpeed`, 'expected a number');
    if (!isNumber(avgReadSpeed)) return c.fail(`${at}.avgReadSpeed`, 'expected a number');
    out.push({ threads, avgWriteSpeed, avgReadSpeed });
  });
  c.throwIfFailed('scaling results');
  return out;
}

/* -------------------------------------------------------------------------------------------------
 * Rebuilding typed runs from checked records
 * ------------------------------------------------------------------------------------------------- */

const num = (obj: UnknownRecord, key: string): number => {
  const v = obj[key];
  return isNumber(v) ? v : 0;
};

const str = (obj: UnknownRecord, key: string): string => {
  const v = obj[key];
  return typeof v === 'string' ? v : '';
};

function phaseOf(obj: UnknownRecord) {
  return PHASES.find(p => p === obj.phase) ?? PHASES[0];
}

function metaOf(s: UnknownRecord) {
  return {
    timestamp: num(s, 'timestamp'),
    timestampIso: str(s, 'timestampIso'),
    segmentLabel: str(s, 'segmentLabel'),
    phase: phaseOf(s),
    warnings: Array.isArray(s.warnings) ? s.warnings.map(String) : [],
  };
}

function headerOf(run: UnknownRecord) {
  const header = {
    layoutVersion: str(run, 'layoutVersion'),
    intervalSec: num(run, 'intervalSec'),
    startedAt: num(run, 'startedAt'),
    startedAtIso: str(run, 'startedAtIso'),
    finishedAt: num(run, 'finishedAt'),
    finishedAtIso: str(run, 'finishedAtIso'),
    durationSec: num(run, 'durationSec'),
    warmupCount: num(run, 'warmupCount'),
    cooldownCount: num(run, 'cooldownCount'),
    restarts: num(run, 'restarts'),
    incomplete: run.incomplete === true,
    poolName: str(run, 'poolName'),
  };
  return typeof run.incompleteReason === 'string'
    ? { ...header, incompleteReason: run.incompleteReason }
    : header;
}

const records = (run: UnknownRecord): UnknownRecord[] =>
  Array.isArray(run.samples) ? run.samples.filter(isRecord) : [];

function toPoolRun(run: UnknownRecord): PoolIostatRun {
  return {
    ...headerOf(run),
    source: 'zpool-iostat',
    samples: records(run).map(s => ({
      ...metaOf(s),
      poolName: str(s, 'poolName'),
      allocBytes: num(s, 'allocBytes'),
      freeBytes: num(s, 'freeBytes'),
      readIOPS: num(s, 'readIOPS'),
      writeIOPS: num(s, 'writeIOPS'),
      readBandwidthMBps: num(s, 'readBandwidthMBps'),
      writeBandwidthMBps: num(s, 'writeBandwidthMBps'),
      readTotalWaitMs: num(s, 'readTotalWaitMs'),
      writeTotalWaitMs: num(s, 'writeTotalWaitMs'),
      readDiskWaitMs: num(s, 'readDiskWaitMs'),
      writeDiskWaitMs: num(s, 'writeDiskWaitMs'),
      readSyncQueueWaitMs: num(s, 'readSyncQueueWaitMs'),
      writeSyncQueueWaitMs: num(s, 'writeSyncQueueWaitMs'),
      readAsyncQueueWaitMs: num(s, 'readAsyncQueueWaitMs'),
      writeAsyncQueueWaitMs: num(s, 'writeAsyncQueueWaitMs'),
      scrubWaitMs: num(s, 'scrubWaitMs'),
      trimWaitMs: num(s, 'trimWaitMs'),
    })),
  };
}

function toArcRun(run: UnknownRecord): ArcRun {
  const hasL2ARC = run.hasL2ARC === true;
  return {
    ...headerOf(run),
    source: 'arcstat',
    hasL2ARC,
    fields: Array.isArray(run.fields) ? run.fields.map(String) : [],
    samples: records(run).map(s => {
      const sample = {
        ...metaOf(s),
        hitPct: num(s, 'hitPct'),
        missPct: num(s, 'missPct'),
        arcSizeGiB: num(s, 'arcSizeGiB'),
        readsPerSec: num(s, 'readsPerSec'),
        hitsPerSec: num(s, 'hitsPerSec'),
        missesPerSec: num(s, 'missesPerSec'),
        demandHitPct: num(s, 'demandHitPct'),
        demandMissPct: num(s, 'demandMissPct'),
        prefetchHitPct: num(s, 'prefetchHitPct'),
        prefetchMissPct: num(s, 'prefetchMissPct'),
        mfuPct: num(s, 'mfuPct'),
        mruPct: num(s, 'mruPct'),
        mfuHitsPerSec: num(s, 'mfuHitsPerSec'),
        mruHitsPerSec: num(s, 'mruHitsPerSec'),
        zfetchHitsPerSec: num(s, 'zfetchHitsPerSec'),
        zfetchMissesPerSec: num(s, 'zfetchMissesPerSec'),
        zfetchIssuedPerSec: num(s, 'zfetchIssuedPerSec'),
        zfetchAheadPerSec: num(s, 'zfetchAheadPerSec'),
        zfetchHitPct: num(s, 'zfetchHitPct'),
      };
      return hasL2ARC
        ? {
            ...sample,
            l2arcHitPct: num(s, 'l2arcHitPct'),
            l2arcSizeGiB: num(s, 'l2arcSizeGiB'),
            l2arcReadMBps: num(s, 'l2arcReadMBps'),
          }
        : sample;
    }),
  };
}
