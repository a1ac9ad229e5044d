import {
  Phase,
  classifyArcPhase,
  classifyPhase,
  countPhases,
  isReservedLabel,
  isSteadyState,
  type PhaseTagged,
} from '../analytics/phase';
import { computeSegmentStats, groupBySegment, metricSeries } from '../analytics/segments';

describe('classifyPhase', () => {
  it('classifies by which directions exceed epsilon', () => {
    expect(classifyPhase({ readActivity: 0.5, writeActivity: 0.2 })).toBe(Phase.IDLE);
    expect(classifyPhase({ readActivity: 50, writeActivity: 0 })).toBe(Phase.READ);
    expect(classifyPhase({ readActivity: 0, writeActivity: 50 })).toBe(Phase.WRITE);
    expect(classifyPhase({ readActivity: 50, writeActivity: 50 })).toBe(Phase.MIXED);
  });

  it('treats activity equal to epsilon as idle', () => {
    expect(classifyPhase({ readActivity: 1, writeActivity: 1 }, 1)).toBe(Phase.IDLE);
    expect(classifyPhase({ readActivity: 1.01, writeActivity: 0 }, 1)).toBe(Phase.READ);
  });

  it('classifies ARC samples by read rate only', () => {
    expect(classifyArcPhase({ readsPerSec: 150 })).toBe(Phase.READ);
    expect(classifyArcPhase({ readsPerSec: 50 })).toBe(Phase.IDLE);
    expect(classifyArcPhase({ readsPerSec: 50 }, 10)).toBe(Phase.READ);
  });
});

describe('isSteadyState', () => {
  it('excludes reserved labels and, by default, idle samples', () => {
    expect(isReservedLabel('warmup')).toBe(true);
    expect(isReservedLabel('1T-write')).toBe(false);

    expect(isSteadyState({ segmentLabel: 'warmup', phase: Phase.WRITE })).toBe(false);
    expect(isSteadyState({ segmentLabel: 'cooldown', phase: Phase.WRITE })).toBe(false);
    expect(isSteadyState({ segmentLabel: 'unsegmented', phase: Phase.WRITE })).toBe(false);
    expect(isSteadyState({ segmentLabel: '1T-write', phase: Phase.WRITE })).toBe(true);
    expect(isSteadyState({ segmentLabel: '1T-write', phase: Phase.IDLE })).toBe(false);
    expect(
      isSteadyState({ segmentLabel: '1T-write', phase: Phase.IDLE }, { excludeIdle: false }),
    ).toBe(true);
  });
});

interface Row extends PhaseTagged {
  writeIOPS: number;
  cacheHits?: number;
}

const ROWS: Row[] = [
  { segmentLabel: 'warmup', phase: Phase.WRITE, writeIOPS: 999 },
  { segmentLabel: '1T-write', phase: Phase.WRITE, writeIOPS: 100 },
  { segmentLabel: '1T-write', phase: Phase.WRITE, writeIOPS: 200, cacheHits: 4 },
  { segmentLabel: '1T-write', phase: Phase.IDLE, writeIOPS: 0 },
  { segmentLabel: '1T-write', phase: Phase.WRITE, writeIOPS: 300 },
  { segmentLabel: '1T-read', phase: Phase.READ, writeIOPS: 0 },
  { segmentLabel: '1T-read', phase: Phase.READ, writeIOPS: 10 },
  { segmentLabel: 'cooldown', phase: Phase.IDLE, writeIOPS: 0 },
];

describe('countPhases', () => {
  it('counts every phase, including absent ones', () => {
    expect(countPhases(ROWS)).toEqual({ IDLE: 2, READ: 2, WRITE: 4, MIXED: 0 });
  });
});

describe('computeSegmentStats', () => {
  it('groups steady-state samples by label in first-seen order', () => {
    const segments = computeSegmentStats(ROWS, ['writeIOPS']);
    expect(segments.map(s => [s.segmentLabel, s.sampleCount])).toEqual([
      ['1T-write', 3],
      ['1T-read', 2],
    ]);
    expect(segments[0].metrics.writeIOPS.mean).toBe(200);
    expect(segments[1].metrics.writeIOPS.max).toBe(10);
  });

  it('can keep every sample', () => {
    const segments = computeSegmentStats(ROWS, ['writeIOPS'], { steadyStateOnly: false });
    expect(segments.map(s => s.segmentLabel)).toEqual(['warmup', '1T-write', '1T-read', 'cooldown']);
    expect(segments[1].sampleCount).toBe(4);
  });

  it('ignores samples where an optional metric is absent', () => {
    const [write] = computeSegmentStats(ROWS, ['cacheHits']);
    expect(write.metrics.cacheHits.count).toBe(1);
    expect(write.metrics.cacheHits.mean).toBe(4);
  });

  it('returns frozen results', () => {
    const segments = computeSegmentStats(ROWS, ['writeIOPS']);
    expect(Object.isFrozen(segments)).toBe(true);
    expect(Object.isFrozen(segments[0].metrics.writeIOPS)).toBe(true);
  });
});

describe('segment helpers', () => {
  it('extracts series and groups', () => {
    expect(metricSeries(ROWS.slice(1, 3), 'cacheHits')).toEqual([NaN, 4]);
    expect([...groupBySegment(ROWS).keys()]).toEqual(['warmup', '1T-write', '1T-read', 'cooldown']);
  });
});
