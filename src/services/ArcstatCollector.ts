import { ARCSTAT_BIN, ARC_IDLE_EPSILON_READS } from '../config/config';
import { classifyArcPhase, type Phase } from '../analytics/phase';
import {
  arcstatFieldList,
  buildArcstatLayout,
  parseArcstatBlock,
  type ArcMetrics,
  type ArcstatLayout,
} from '../parsers/arcstatParser';
import type { ParsedBlock } from '../parsers/poolIostatParser';
import {
  TelemetryCollector,
  type CollectorOptions,
  type Sample,
  type SourceCommand,
  type TelemetryRun,
} from './TelemetryCollector';

export interface ArcRunInfo {
  poolName: string;
  hasL2ARC: boolean;
  fields: readonly string[];
}

export type ArcSample = Sample<ArcMetrics>;
export type ArcRun = TelemetryRun<ArcMetrics, ArcRunInfo>;

export interface ArcstatCollectorOptions extends CollectorOptions {
  /** arcstat binary, defaults to ARCSTAT_BIN */
  binary?: string;
  /** Pool the ARC run belongs to (ARC itself is system wide). */
  poolName?: string;
  /**
   * Request the L2ARC field group. Fixed for the collector's lifetime:
   * arcstat rejects these fields on systems without a cache device.
   */
  hasL2ARC?: boolean;
  idleEpsilonReads?: number;
}

/** Samples `arcstat -p -f <fields> <interval>` (raw numbers, no suffixes). */
export class ArcstatCollector extends TelemetryCollector<ArcMetrics, ArcRunInfo> {
  protected readonly source = 'arcstat' as const;
  protected readonly logTag = 'Arcstat';
  protected readonly layoutVersion: string;

  public readonly poolName: string;
  public readonly hasL2ARC: boolean;
  private readonly binary: string;
  private readonly layout: ArcstatLayout;
  private readonly idleEpsilon: number;

  constructor(options: ArcstatCollectorOptions = {}) {
    super(options);
    this.poolName = options.poolName ?? '';
    this.hasL2ARC = options.hasL2ARC ?? false;
    this.binary = options.binary ?? ARCSTAT_BIN;
    this.layout = buildArcstatLayout(this.hasL2ARC);
    this.layoutVersion = this.layout.version;
    this.idleEpsilon = options.idleEpsilonReads ?? ARC_IDLE_EPSILON_READS;
  }

  protected buildCommand(): SourceCommand {
    return {
      command: this.binary,
      args: ['-p', '-f', arcstatFieldList(this.layout), String(this.intervalSec)],
    };
  }

  protected parseBlock(line: string): ParsedBlock<ArcMetrics> | null {
    return parseArcstatBlock(line, this.layout);
  }

  protected classify(metrics: ArcMetrics): Phase {
    return classifyArcPhase(metrics, this.idleEpsilon);
  }

  protected runInfo(): ArcRunInfo {
    return {
      poolName: this.poolName,
      hasL2ARC: this.hasL2ARC,
      fields: this.layout.columns.map(([field]) => field),
    };
  }
}
