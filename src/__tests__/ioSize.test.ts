import { analyzeIoSize, kbPerOp } from '../analytics/ioSize';
import { Phase } from '../analytics/phase';

const sample = (
  phase: Phase,
  { readIOPS = 0, writeIOPS = 0, readBandwidthMBps = 0, writeBandwidthMBps = 0 } = {},
) => ({
  segmentLabel: '4T-mixed',
  phase,
  readIOPS,
  writeIOPS,
  readBandwidthMBps,
  writeBandwidthMBps,
});

describe('kbPerOp', () => {
  it('divides bandwidth by operations', () => {
    expect(kbPerOp(12.5, 100)).toBe(128);
    expect(kbPerOp(1, 0)).toBe(0);
  });
});

describe('analyzeIoSize', () => {
  it('uses only samples that move data in each direction', () => {
    const result = analyzeIoSize([
      sample(Phase.WRITE, { writeIOPS: 100, writeBandwidthMBps: 12.5 }),
      sample(Phase.READ, { readIOPS: 200, readBandwidthMBps: 25 }),
      sample(Phase.MIXED, {
        readIOPS: 64,
        readBandwidthMBps: 4,
        writeIOPS: 32,
        writeBandwidthMBps: 8,
      }),
      // ignored: idle, and a write phase without operations
      sample(Phase.IDLE, { writeIOPS: 10, writeBandwidthMBps: 1 }),
      sample(Phase.WRITE, { writeIOPS: 0, writeBandwidthMBps: 3 }),
      // a READ sample never contributes to writes
      sample(Phase.READ, { writeIOPS: 5, writeBandwidthMBps: 5, readIOPS: 8, readBandwidthMBps: 1 }),
    ]);

    expect(result.writeKbPerOp.count).toBe(2);
    expect(result.writeKbPerOp.min).toBe(128);
    expect(result.writeKbPerOp.max).toBe(256);
    expect(result.readKbPerOp.count).toBe(3);
    expect(result.readKbPerOp.min).toBe(64);
    expect(result.readKbPerOp.median).toBe(128);
  });

  it('returns empty stats without samples', () => {
    expect(analyzeIoSize([]).readKbPerOp.count).toBe(0);
  });
});
