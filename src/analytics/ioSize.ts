import type { PoolIostatMetrics } from '../parsers/poolIostatParser';
import { Phase, type PhaseTagged } from './phase';
import { computeStats, type Stats } from './statistics';

export interface IoSizeAnalysis {
  writeKbPerOp: Stats;
  readKbPerOp: Stats;
}

type IoSample = PhaseTagged &
  Pick<PoolIostatMetrics, 'readIOPS' | 'writeIOPS' | 'readBandwidthMBps' | 'writeBandwidthMBps'>;

export const kbPerOp = (bandwidthMBps: number, iops: number): number =>
  iops > 0 ? (bandwidthMBps * 1024) / iops : 0;

/**
 * Average I/O size per direction. Only samples of a phase that moves data
 * in that direction and with a non-zero operation count contribute.
 */
export function analyzeIoSize(samples: readonly IoSample[]): IoSizeAnalysis {
  const write: number[] = [];
  const read: number[] = [];
  for (const s of samples) {
    if ((s.phase === Phase.WRITE || s.phase === Phase.MIXED) && s.writeIOPS > 0) {
      write.push(kbPerOp(s.writeBandwidthMBps, s.writeIOPS));
    }
    if ((s.phase === Phase.READ || s.phase === Phase.MIXED) && s.readIOPS > 0) {
      read.push(kbPerOp(s.readBandwidthMBps, s.readIOPS));
    }
  }
  return { writeKbPerOp: computeStats(write), readKbPerOp: computeStats(read) };
}
