import { ARC_IDLE_EPSILON_READS, PHASE_IDLE_EPSILON_MBPS } from '../config/config';

export const Phase = {
  IDLE: 'IDLE',
  READ: 'READ',
  WRITE: 'WRITE',
  MIXED: 'MIXED',
} as const;

export type Phase = (typeof Phase)[keyof typeof Phase];

export const PHASES: readonly Phase[] = [Phase.IDLE, Phase.READ, Phase.WRITE, Phase.MIXED];

// Labels the collector assigns itself; never a benchmark configuration
export const WARMUP_LABEL = 'warmup';
export const COOLDOWN_LABEL = 'cooldown';
export const UNSEGMENTED_LABEL = 'unsegmented';

const RESERVED_LABELS: ReadonlySet<string> = new Set([
  WARMUP_LABEL,
  COOLDOWN_LABEL,
  UNSEGMENTED_LABEL,
]);

export const isReservedLabel = (label: string): boolean => RESERVED_LABELS.has(label);

export interface Activity {
  readActivity: number;
  writeActivity: number;
}

export function classifyPhase(
  { readActivity, writeActivity }: Activity,
  epsilon: number = PHASE_IDLE_EPSILON_MBPS,
): Phase {
  const reading = readActivity > epsilon;
  const writing = writeActivity > epsilon;
  if (reading && writing) return Phase.MIXED;
  if (reading) return Phase.READ;
  if (writing) return Phase.WRITE;
  return Phase.IDLE;
}

export const poolActivity = (m: {
  readBandwidthMBps: number;
  writeBandwidthMBps: number;
}): Activity => ({
  readActivity: m.readBandwidthMBps,
  writeActivity: m.writeBandwidthMBps,
});

// ARC sees only read traffic
export const arcActivity = (m: { readsPerSec: number }): Activity => ({
  readActivity: m.readsPerSec,
  writeActivity: 0,
});

export const classifyArcPhase = (
  m: { readsPerSec: number },
  epsilon: number = ARC_IDLE_EPSILON_READS,
): Phase => classifyPhase(arcActivity(m), epsilon);

export interface PhaseTagged {
  segmentLabel: string;
  phase: Phase;
}

export interface SteadyStateOptions {
  /** Drop IDLE samples as well (pool samples). Defaults to true. */
  excludeIdle?: boolean;
}

/**
 * A steady-state sample carries a benchmark segment label and, unless
 * disabled, shows I/O activity.
 */
export function isSteadyState(
  sample: PhaseTagged,
  { excludeIdle = true }: SteadyStateOptions = {},
): boolean {
  if (!sample.segmentLabel || isReservedLabel(sample.segmentLabel)) return false;
  return !(excludeIdle && sample.phase === Phase.IDLE);
}

export function countPhases(samples: readonly PhaseTagged[]): Record<Phase, number> {
  const counts: Record<Phase, number> = { IDLE: 0, READ: 0, WRITE: 0, MIXED: 0 };
  for (const s of samples) counts[s.phase]++;
  return counts;
}
