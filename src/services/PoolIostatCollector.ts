import { PHASE_IDLE_EPSILON_MBPS, ZPOOL_BIN } from '../config/config';
import { ValidationError } from '../errors/CustomError';
import { classifyPhase, poolActivity, type Phase } from '../analytics/phase';
import {
  ZPOOL_IOSTAT_LAYOUT_V1,
  parsePoolIostatBlock,
  type ParsedBlock,
  type PoolIostatLayout,
  type PoolIostatMetrics,
} from '../parsers/poolIostatParser';
import {
  TelemetryCollector,
  type CollectorOptions,
  type Sample,
  type SourceCommand,
  type TelemetryRun,
} from './TelemetryCollector';

export interface PoolRunInfo {
  poolName: string;
}

export type PoolIostatSample = Sample<PoolIostatMetrics>;
export type PoolIostatRun = TelemetryRun<PoolIostatMetrics, PoolRunInfo>;

export interface PoolIostatCollectorOptions extends CollectorOptions {
  /** zpool binary, defaults to ZPOOL_BIN */
  binary?: string;
  layout?: PoolIostatLayout;
  idleEpsilonMBps?: number;
}

// zpool accepts names of letters, digits and _-.: starting with a letter
const POOL_NAME_RE = /^[A-Za-z][A-Za-z0-9_.:-]*$/;

/**
 * Samples `zpool iostat -H -y -l <pool> <interval>`.
 *
 * -H gives tab separated lines without headers, -y drops the since-boot
 * report, -l adds the latency columns.
 */
export class PoolIostatCollector extends TelemetryCollector<PoolIostatMetrics, PoolRunInfo> {
  protected readonly source = 'zpool-iostat' as const;
  protected readonly logTag = 'PoolIostat';
  protected readonly layoutVersion: string;

  private readonly binary: string;
  private readonly layout: PoolIostatLayout;
  private readonly idleEpsilon: number;

  constructor(
    public readonly poolName: string,
    options: PoolIostatCollectorOptions = {},
  ) {
    super(options);
    if (!POOL_NAME_RE.test(poolName)) {
      throw new ValidationError(`Invalid pool name "${poolName}"`, [
        { field: 'poolName', message: 'must start with a letter' },
      ]);
    }
    this.binary = options.binary ?? ZPOOL_BIN;
    this.layout = options.layout ?? ZPOOL_IOSTAT_LAYOUT_V1;
    this.layoutVersion = this.layout.version;
    this.idleEpsilon = options.idleEpsilonMBps ?? PHASE_IDLE_EPSILON_MBPS;
  }

  protected buildCommand(): SourceCommand {
    return {
      command: this.binary,
      args: ['iostat', '-H', '-y', '-l', this.poolName, String(this.intervalSec)],
    };
  }

  protected parseBlock(line: string): ParsedBlock<PoolIostatMetrics> | null {
    const parsed = parsePoolIostatBlock(line, this.layout);
    // other pools never show up for a named pool, but stay strict
    if (!parsed || parsed.metrics.poolName !== this.poolName) return null;
    return parsed;
  }

  protected classify(metrics: PoolIostatMetrics): Phase {
    return classifyPhase(poolActivity(metrics), this.idleEpsilon);
  }

  protected runInfo(): PoolRunInfo {
    return { poolName: this.poolName };
  }
}
