// src/services/TelemetryCollector.ts
import { ReadlineParser } from '@serialport/parser-readline';
import {
  TELEMETRY_COOLDOWN_SAMPLES,
  TELEMETRY_INTERVAL_SEC,
  TELEMETRY_KILL_GRACE_MS,
  TELEMETRY_MAX_RESTARTS,
  TELEMETRY_WARMUP_SAMPLES,
} from '../config/config';
import {
  CollectorStateError,
  SourceUnavailableError,
  ValidationError,
  errorMessage,
} from '../errors/CustomError';
import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import {
  COOLDOWN_LABEL,
  UNSEGMENTED_LABEL,
  WARMUP_LABEL,
  isReservedLabel,
  type Phase,
} from '../analytics/phase';
import type { ParsedBlock } from '../parsers/poolIostatParser';

/* -------------------------------------------------------------------------------------------------
 * Types
 * ------------------------------------------------------------------------------------------------- */

export type TelemetrySource = 'zpool-iostat' | 'arcstat';

export type CollectorState = 'idle' | 'warming' | 'active' | 'coolingDown' | 'stopped';

export interface SampleMeta {
  timestamp: number; // epoch ms, strictly increasing per collector
  timestampIso: string;
  segmentLabel: string;
  phase: Phase;
  /** Per-field parse warnings; empty when the block parsed cleanly. */
  warnings: readonly string[];
}

export type Sample<TMetrics> = Readonly<TMetrics & SampleMeta>;

export interface TelemetryRunBase<TMetrics> {
  source: TelemetrySource;
  layoutVersion: string;
  intervalSec: number;
  startedAt: number;
  startedAtIso: string;
  finishedAt: number;
  finishedAtIso: string;
  durationSec: number;
  warmupCount: number; // samples captured as 'warmup'
  cooldownCount: number; // samples captured as 'cooldown'
  restarts: number;
  incomplete: boolean;
  incompleteReason?: string;
  samples: readonly Sample<TMetrics>[];
}

export type TelemetryRun<TMetrics, TInfo> = Readonly<TelemetryRunBase<TMetrics> & TInfo>;

/** The slice of a child process the collector relies on. */
export interface SourceProcess extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnSource = (command: string, args: readonly string[]) => SourceProcess;

export interface CollectorOptions {
  /** Sampling interval passed to the tool, whole seconds. */
  intervalSec?: number;
  /** Respawns allowed after an unexpected exit. */
  maxRestarts?: number;
  /** Delay before a respawn, multiplied by the attempt number. */
  restartDelayMs?: number;
  /** SIGTERM -> SIGKILL grace period on stop. */
  killGraceMs?: number;
  spawn?: SpawnSource;
  /** Clock used for sample timestamps (epoch ms). */
  now?: () => number;
}

export interface SourceCommand {
  command: string;
  args: string[];
}

const defaultSpawn: SpawnSource = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

const STDERR_TAIL_LINES = 5;

interface ChildHandle {
  proc: SourceProcess;
  parser: ReadlineParser | null;
  spawned: boolean;
  exited: boolean;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

function assertSampleCount(name: string, value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer`, [
      { field: name, message: `got ${value}` },
    ]);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Implementation
 * ------------------------------------------------------------------------------------------------- */

/**
 * Background sampler around one long-running statistics tool.
 *
 * Contract:
 * - Inputs: start(warmupCount), segment(label), stop(cooldownCount) from the benchmark driver.
 * - Outputs: a frozen TelemetryRun with samples in capture order.
 * - Error modes: spawn failure rejects start() with SourceUnavailableError; a source that dies
 *   after startup is respawned up to maxRestarts, then the run is marked incomplete.
 * - State: idle -> warming -> active -> coolingDown -> stopped.
 *
 * The buffer and the label are only touched from event callbacks of this instance.
 */
export abstract class TelemetryCollector<TMetrics extends object, TInfo extends object> {
  protected abstract readonly source: TelemetrySource;
  protected abstract readonly layoutVersion: string;
  protected abstract readonly logTag: string;

  protected readonly intervalSec: number;
  private readonly maxRestarts: number;
  private readonly restartDelayMs: number;
  private readonly killGraceMs: number;
  private readonly spawnSource: SpawnSource;
  private readonly now: () => number;

  private state: CollectorState = 'idle';
  private samples: Sample<TMetrics>[] = [];
  private currentLabel: string | null = null;
  private lastTimestamp = 0;

  private child: ChildHandle | null = null;
  private everSpawned = false;
  private sourceDead = false;
  private restarts = 0;
  private restartTimer: NodeJS.Timeout | null = null;
  private stderrTail: string[] = [];

  private startedAt = 0;
  private warmupTarget = 0;
  private warmupCaptured = 0;
  private warmupWaiter: Waiter | null = null;
  private cooldownTarget = 0;
  private cooldownCaptured = 0;
  private cooldownWaiter: (() => void) | null = null;

  private incompleteReason: string | null = null;
  private stopPromise: Promise<TelemetryRun<TMetrics, TInfo>> | null = null;

  constructor(options: CollectorOptions = {}) {
    this.intervalSec = options.intervalSec ?? TELEMETRY_INTERVAL_SEC;
    this.maxRestarts = options.maxRestarts ?? TELEMETRY_MAX_RESTARTS;
    this.restartDelayMs = options.restartDelayMs ?? 1000;
    this.killGraceMs = options.killGraceMs ?? TELEMETRY_KILL_GRACE_MS;
    this.spawnSource = options.spawn ?? defaultSpawn;
    this.now = options.now ?? Date.now;
    if (!Number.isInteger(this.intervalSec) || this.intervalSec < 1) {
      throw new ValidationError('intervalSec must be a positive integer', [
        { field: 'intervalSec', message: `got ${this.intervalSec}` },
      ]);
    }
  }

  /* ----------------------------------------------------------------------------------------------
   * Source specific hooks
   * ---------------------------------------------------------------------------------------------- */

  protected abstract buildCommand(): SourceCommand;

  /** null for lines that are not data (headers, blanks). */
  protected abstract parseBlock(line: string): ParsedBlock<TMetrics> | null;

  protected abstract classify(metrics: TMetrics): Phase;

  /** Source specific fields merged into the returned run. */
  protected abstract runInfo(): TInfo;

  /* ----------------------------------------------------------------------------------------------
   * Driver API
   * ---------------------------------------------------------------------------------------------- */

  /**
   * Spawns the source and resolves once `warmupCount` samples were captured
   * (as soon as the tool is running when 0).
   */
  public start(warmupCount: number = TELEMETRY_WARMUP_SAMPLES): Promise<void> {
    if (this.state !== 'idle') {
      return Promise.reject(
        new CollectorStateError(`start() called while ${this.state}`),
      );
    }
    try {
      assertSampleCount('warmupCount', warmupCount);
    } catch (err) {
      return Promise.reject(err);
    }

    this.state = 'warming';
    this.startedAt = this.now();
    this.warmupTarget = warmupCount;
    const { command, args } = this.buildCommand();
    console.log(
      `[${this.logTag}] Starting ${command} ${args.join(' ')} (warmup: ${warmupCount})`,
    );

    return new Promise<void>((resolve, reject) => {
      this.warmupWaiter = { resolve, reject };
      this.launch();
    });
  }

  /**
   * Sets the label for samples captured from now on. Buffered samples keep
   * their label. While warming or cooling down the reserved label wins.
   */
  public segment(label: string): void {
    if (this.state === 'stopped') {
      throw new CollectorStateError('segment() called after stop');
    }
    const trimmed = typeof label === 'string' ? label.trim() : '';
    if (!trimmed) {
      throw new ValidationError('Segment label must be a non-empty string', [
        { field: 'label', message: 'empty' },
      ]);
    }
    if (isReservedLabel(trimmed)) {
      throw new ValidationError(`Segment label "${trimmed}" is reserved`, [
        { field: 'label', message: 'reserved' },
      ]);
    }
    this.currentLabel = trimmed;
  }

  /**
   * Collects `cooldownCount` more samples, terminates the source and returns
   * the frozen run. Repeated calls return the same run.
   */
  public stop(
    cooldownCount: number = TELEMETRY_COOLDOWN_SAMPLES,
  ): Promise<TelemetryRun<TMetrics, TInfo>> {
    if (this.stopPromise) return this.stopPromise;
    try {
      assertSampleCount('cooldownCount', cooldownCount);
    } catch (err) {
      return Promise.reject(err);
    }
    this.stopPromise = this.finish(cooldownCount);
    return this.stopPromise;
  }

  public getState(): CollectorState {
    return this.state;
  }

  public getSampleCount(): number {
    return this.samples.length;
  }

  public getCurrentLabel(): string {
    return this.currentLabel ?? UNSEGMENTED_LABEL;
  }

  public getRestartCount(): number {
    return this.restarts;
  }

  /* ----------------------------------------------------------------------------------------------
   * Lifecycle internals
   * ---------------------------------------------------------------------------------------------- */

  private async finish(cooldownCount: number): Promise<TelemetryRun<TMetrics, TInfo>> {
    if (this.state === 'idle') {
      this.markIncomplete('collector was never started');
    } else if (this.state === 'warming' || this.state === 'active') {
      this.state = 'coolingDown';
      this.settleWarmup();
      if (cooldownCount > 0 && !this.sourceDead) {
        console.log(`[${this.logTag}] Cooling down (${cooldownCount} samples)...`);
        this.cooldownTarget = cooldownCount;
        await new Promise<void>(resolve => {
          this.cooldownWaiter = resolve;
        });
        if (this.cooldownCaptured < cooldownCount) {
          this.markIncomplete(
            this.incompleteReason ??
              `cooldown ended after ${this.cooldownCaptured}/${cooldownCount} samples`,
          );
        }
      }
    }

    await this.terminate();
    this.state = 'stopped';
    const run = this.buildRun();
    console.log(
      `[${this.logTag}] Stopped: ${run.samples.length} samples` +
        (run.incomplete ? ` (incomplete: ${run.incompleteReason})` : ''),
    );
    return run;
  }

  private launch() {
    const { command, args } = this.buildCommand();
    let proc: SourceProcess;
    try {
      proc = this.spawnSource(command, args);
    } catch (err) {
      this.onSpawnError(command, err);
      return;
    }

    const handle: ChildHandle = { proc, parser: null, spawned: false, exited: false };
    this.child = handle;

    proc.once('spawn', () => {
      handle.spawned = true;
      this.everSpawned = true;
      if (this.child === handle) this.onSpawned();
    });
    proc.on('error', (err: Error) => {
      if (!handle.spawned && this.child === handle) {
        this.onSpawnError(command, err);
      } else {
        console.error(`[${this.logTag}] Source error:`, err.message);
      }
    });
    proc.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      handle.exited = true;
      if (this.child === handle) this.onUnexpectedExit(code, signal);
    });

    if (proc.stdout) {
      handle.parser = proc.stdout.pipe(new ReadlineParser({ delimiter: '\n' }));
      handle.parser.on('data', (line: string) => {
        if (this.child === handle) this.onLine(line);
      });
    }
    proc.stderr?.on('data', (chunk: Buffer | string) => {
      for (const line of chunk.toString().split('\n')) {
        const trimmed = line.trim();
        if (!trimmed) continue;
        this.stderrTail.push(trimmed);
        if (this.stderrTail.length > STDERR_TAIL_LINES) this.stderrTail.shift();
        console.warn(`[${this.logTag}] stderr: ${trimmed}`);
      }
    });
  }

  private onSpawned() {
    if (this.state === 'warming' && this.warmupCaptured >= this.warmupTarget) {
      this.becomeActive();
    }
  }

  private onSpawnError(command: string, err: unknown) {
    this.child = null;
    if (!this.everSpawned) {
      // the tool never ran: nothing to restart
      const error = new SourceUnavailableError(command, errorMessage(err));
      console.error(`[${this.logTag}] ${error.message}`);
      this.sourceDead = true;
      this.markIncomplete(error.message);
      this.state = 'stopped';
      this.rejectWarmup(error);
      this.releaseCooldown();
      return;
    }
    console.error(`[${this.logTag}] Respawn of ${command} failed: ${errorMessage(err)}`);
    this.scheduleRestart(`respawn failed: ${errorMessage(err)}`);
  }

  private onUnexpectedExit(code: number | null, signal: NodeJS.Signals | null) {
    this.child = null;
    if (this.state === 'stopped' || this.state === 'idle') return;
    const how = signal ? `signal ${signal}` : `code ${code}`;
    const tail = this.stderrTail.length ? ` (${this.stderrTail.join(' | ')})` : '';
    console.warn(`[${this.logTag}] Source exited unexpectedly with ${how}${tail}`);
    this.scheduleRestart(`source exited with ${how}${tail}`);
  }

  private scheduleRestart(reason: string) {
    if (this.restarts >= this.maxRestarts) {
      this.sourceDead = true;
      this.markIncomplete(`${reason}; gave up after ${this.restarts} restarts`);
      console.error(`[${this.logTag}] Giving up after ${this.restarts} restarts`);
      this.settleWarmup();
      this.releaseCooldown();
      return;
    }
    const attempt = ++this.restarts;
    const delay = this.restartDelayMs * attempt;
    console.log(`[${this.logTag}] Restart attempt ${attempt}/${this.maxRestarts} in ${delay}ms`);
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      if (this.state === 'stopped') return;
      this.launch();
    }, delay);
    this.restartTimer.unref();
  }

  private onLine(line: string) {
    const parsed = this.parseBlock(line);
    if (!parsed) return;
    if (this.state !== 'warming' && this.state !== 'active' && this.state !== 'coolingDown') {
      return;
    }

    const label =
      this.state === 'warming'
        ? WARMUP_LABEL
        : this.state === 'coolingDown'
          ? COOLDOWN_LABEL
          : this.getCurrentLabel();
    const timestamp = Math.max(this.now(), this.lastTimestamp + 1);
    this.lastTimestamp = timestamp;

    const sample: Sample<TMetrics> = Object.freeze({
      ...parsed.metrics,
      timestamp,
      timestampIso: new Date(timestamp).toISOString(),
      segmentLabel: label,
      phase: this.classify(parsed.metrics),
      warnings: Object.freeze([...parsed.warnings]),
    });
    this.samples.push(sample);
    if (parsed.warnings.length) {
      console.warn(`[${this.logTag}] Parse warnings: ${parsed.warnings.join('; ')}`);
    }

    if (this.state === 'warming') {
      this.warmupCaptured++;
      if (this.warmupCaptured >= this.warmupTarget) this.becomeActive();
    } else if (this.state === 'coolingDown' && this.cooldownWaiter) {
      this.cooldownCaptured++;
      if (this.cooldownCaptured >= this.cooldownTarget) this.releaseCooldown();
    }
  }

  private becomeActive() {
    this.state = 'active';
    console.log(`[${this.logTag}] Warmup complete (${this.warmupCaptured} samples)`);
    this.settleWarmup();
  }

  private settleWarmup() {
    const waiter = this.warmupWaiter;
    this.warmupWaiter = null;
    waiter?.resolve();
  }

  private rejectWarmup(err: Error) {
    const waiter = this.warmupWaiter;
    this.warmupWaiter = null;
    waiter?.reject(err);
  }

  private releaseCooldown() {
    const release = this.cooldownWaiter;
    this.cooldownWaiter = null;
    release?.();
  }

  private markIncomplete(reason: string) {
    if (this.incompleteReason === null) this.incompleteReason = reason;
  }

  /** SIGTERM, then SIGKILL after the grace period; detaches every listener. */
  private terminate(): Promise<void> {
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    const handle = this.child;
    this.child = null;
    if (!handle) return Promise.resolve();

    const { proc, parser } = handle;
    // the 'error' listener stays: an emitter without one throws
    parser?.removeAllListeners('data');
    if (parser && proc.stdout) proc.stdout.unpipe(parser);
    proc.stderr?.removeAllListeners('data');

    if (handle.exited) {
      proc.removeAllListeners('exit');
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      const timer = setTimeout(() => {
        console.warn(`[${this.logTag}] Source ignored SIGTERM, sending SIGKILL`);
        proc.kill('SIGKILL');
        proc.removeAllListeners('exit');
        resolve();
      }, this.killGraceMs);
      proc.once('exit', () => {
        clearTimeout(timer);
        proc.removeAllListeners('exit');
        resolve();
      });
      proc.kill('SIGTERM');
    });
  }

  private buildRun(): TelemetryRun<TMetrics, TInfo> {
    const finishedAt = this.now();
    const startedAt = this.startedAt || finishedAt;
    const samples = Object.freeze(this.samples.slice());
    const base: TelemetryRunBase<TMetrics> = {
      source: this.source,
      layoutVersion: this.layoutVersion,
      intervalSec: this.intervalSec,
      startedAt,
      startedAtIso: new Date(startedAt).toISOString(),
      finishedAt,
      finishedAtIso: new Date(finishedAt).toISOString(),
      durationSec: Math.max(0, finishedAt - startedAt) / 1000,
      warmupCount: samples.filter(s => s.segmentLabel === WARMUP_LABEL).length,
      cooldownCount: samples.filter(s => s.segmentLabel === COOLDOWN_LABEL).length,
      restarts: this.restarts,
      incomplete: this.incompleteReason !== null,
      samples,
    };
    if (this.incompleteReason !== null) base.incompleteReason = this.incompleteReason;
    return Object.freeze({ ...base, ...this.runInfo() });
  }
}
