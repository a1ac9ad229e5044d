import { Phase } from '../analytics/phase';
import {
  CollectorStateError,
  SourceUnavailableError,
  ValidationError,
} from '../errors/CustomError';
import { PoolIostatCollector } from '../services/PoolIostatCollector';
import { fakeSpawner, fixedClock, flush, poolLine } from './helpers/fakeSource';

const WRITE = poolLine('tank', { writeOps: 300, writeBw: '40M', totalWaitW: '2ms' });
const READ = poolLine('tank', { readOps: 500, readBw: '60M', totalWaitR: '800us' });
const IDLE = poolLine('tank');

function setup(options: { maxRestarts?: number; killGraceMs?: number } = {}) {
  const fake = fakeSpawner();
  const collector = new PoolIostatCollector('tank', {
    binary: 'zpool',
    spawn: fake.spawn,
    now: fixedClock(),
    restartDelayMs: 0,
    maxRestarts: options.maxRestarts ?? 0,
    killGraceMs: options.killGraceMs ?? 50,
  });
  return { collector, ...fake };
}

describe('PoolIostatCollector', () => {
  it('spawns zpool iostat with latency columns for the pool', async () => {
    const { collector, processes } = setup();
    const started = collector.start(0);
    await started;
    expect(processes).toHaveLength(1);
    expect(processes[0].command).toBe('zpool');
    expect(processes[0].args).toEqual(['iostat', '-H', '-y', '-l', 'tank', '1']);
    await collector.stop(0);
  });

  it('labels warmup, segment and cooldown samples in capture order', async () => {
    const { collector, processes } = setup();
    const started = collector.start(2);
    await flush();
    const proc = processes[0];
    expect(collector.getState()).toBe('warming');

    proc.emitLine(IDLE);
    proc.emitLine(IDLE);
    await started;
    expect(collector.getState()).toBe('active');

    collector.segment('1T-write');
    proc.emitLine(WRITE);
    proc.emitLine(WRITE);
    await flush();
    collector.segment('1T-read');
    proc.emitLine(READ);
    await flush();

    const stopping = collector.stop(1);
    expect(collector.getState()).toBe('coolingDown');
    proc.emitLine(IDLE);
    const run = await stopping;

    expect(collector.getState()).toBe('stopped');
    expect(run.samples.map(s => s.segmentLabel)).toEqual([
      'warmup',
      'warmup',
      '1T-write',
      '1T-write',
      '1T-read',
      'cooldown',
    ]);
    expect(run.samples.map(s => s.phase)).toEqual([
      Phase.IDLE,
      Phase.IDLE,
      Phase.WRITE,
      Phase.WRITE,
      Phase.READ,
      Phase.IDLE,
    ]);
    expect(run.samples.map(s => s.timestamp)).toEqual([1000, 1001, 1002, 1003, 1004, 1005]);
    expect(run.samples[2].writeBandwidthMBps).toBe(40);
    expect(run.samples[2].writeTotalWaitMs).toBe(2);
    expect(run.samples[4].readTotalWaitMs).toBe(0.8);
    expect(run).toMatchObject({
      source: 'zpool-iostat',
      layoutVersion: 'zpool-iostat-l/v1',
      poolName: 'tank',
      intervalSec: 1,
      warmupCount: 2,
      cooldownCount: 1,
      restarts: 0,
      incomplete: false,
    });
    expect(run.incompleteReason).toBeUndefined();
    expect(proc.killSignals).toEqual(['SIGTERM']);
  });

  it('labels samples before the first segment as unsegmented', async () => {
    const { collector, processes } = setup();
    await collector.start(0);
    expect(collector.getCurrentLabel()).toBe('unsegmented');
    processes[0].emitLine(WRITE);
    await flush();
    const run = await collector.stop(0);
    expect(run.samples.map(s => s.segmentLabel)).toEqual(['unsegmented']);
  });

  it('applies a label set during warmup once warmup ends', async () => {
    const { collector, processes } = setup();
    const started = collector.start(1);
    collector.segment('8T-write');
    await flush();
    processes[0].emitLine(WRITE);
    await started;
    processes[0].emitLine(WRITE);
    await flush();
    const run = await collector.stop(0);
    expect(run.samples.map(s => s.segmentLabel)).toEqual(['warmup', '8T-write']);
  });

  it('rejects empty and reserved segment labels', async () => {
    const { collector } = setup();
    await collector.start(0);
    expect(() => collector.segment('  ')).toThrow(ValidationError);
    expect(() => collector.segment('warmup')).toThrow(ValidationError);
    expect(() => collector.segment('cooldown')).toThrow('Segment label "cooldown" is reserved');
    await collector.stop(0);
    expect(() => collector.segment('1T-write')).toThrow(CollectorStateError);
  });

  it('rejects a second start', async () => {
    const { collector } = setup();
    await collector.start(0);
    await expect(collector.start(0)).rejects.toBeInstanceOf(CollectorStateError);
    await collector.stop(0);
  });

  it('rejects invalid sample counts', async () => {
    const { collector } = setup();
    await expect(collector.start(-1)).rejects.toBeInstanceOf(ValidationError);
    expect(collector.getState()).toBe('idle');
  });

  it('ignores header lines and lines of other pools', async () => {
    const { collector, processes } = setup();
    await collector.start(0);
    processes[0].emitLine('pool alloc free read write read write');
    processes[0].emitLine(poolLine('backup', { writeOps: 10 }));
    processes[0].emitLine(WRITE);
    await flush();
    const run = await collector.stop(0);
    expect(run.samples).toHaveLength(1);
    expect(run.samples[0].poolName).toBe('tank');
  });

  it('keeps samples with malformed fields and records the warning', async () => {
    const { collector, processes } = setup();
    await collector.start(0);
    processes[0].emitLine(poolLine('tank', { readOps: 5, totalWaitR: 'abc' }));
    await flush();
    const run = await collector.stop(0);
    expect(run.samples[0].readTotalWaitMs).toBe(0);
    expect(run.samples[0].warnings).toEqual(['readTotalWaitMs: malformed token "abc"']);
  });

  it('returns the same frozen run from repeated stops', async () => {
    const { collector, processes } = setup();
    await collector.start(0);
    processes[0].emitLine(WRITE);
    await flush();

    const first = collector.stop(0);
    const second = collector.stop(5);
    expect(second).toBe(first);
    const run = await first;
    expect(await collector.stop()).toBe(run);

    expect(Object.isFrozen(run)).toBe(true);
    expect(Object.isFrozen(run.samples)).toBe(true);
    expect(Object.isFrozen(run.samples[0])).toBe(true);
    expect(processes).toHaveLength(1);
    expect(processes[0].killSignals).toEqual(['SIGTERM']);
  });

  it('waits for the requested cooldown samples', async () => {
    const { collector, processes } = setup();
    await collector.start(0);

    let done = false;
    const stopping = collector.stop(2).then(run => {
      done = true;
      return run;
    });
    processes[0].emitLine(IDLE);
    await flush();
    expect(done).toBe(false);

    processes[0].emitLine(IDLE);
    const run = await stopping;
    expect(run.cooldownCount).toBe(2);
    expect(run.incomplete).toBe(false);
  });

  it('escalates to SIGKILL when the source ignores SIGTERM', async () => {
    const { collector, processes } = setup({ killGraceMs: 20 });
    await collector.start(0);
    processes[0].ignoreSigterm = true;
    await collector.stop(0);
    expect(processes[0].killSignals).toEqual(['SIGTERM', 'SIGKILL']);
  });

  it('returns an incomplete empty run when never started', async () => {
    const { collector, processes } = setup();
    const run = await collector.stop();
    expect(processes).toHaveLength(0);
    expect(run.samples).toEqual([]);
    expect(run.incomplete).toBe(true);
    expect(run.incompleteReason).toBe('collector was never started');
  });

  it('rejects start with SourceUnavailableError when the tool is missing', async () => {
    const fake = fakeSpawner(() => 'missing');
    const collector = new PoolIostatCollector('tank', {
      binary: 'zpool',
      spawn: fake.spawn,
      now: fixedClock(),
    });

    const error = await collector.start(3).then(
      () => undefined,
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(SourceUnavailableError);
    if (!(error instanceof SourceUnavailableError)) return;
    expect(error.code).toBe('SOURCE_UNAVAILABLE');
    expect(error.command).toBe('zpool');
    expect(error.message).toBe('spawn zpool ENOENT: zpool');
    expect(collector.getState()).toBe('stopped');

    const run = await collector.stop(3);
    expect(run.samples).toEqual([]);
    expect(run.incomplete).toBe(true);
    expect(run.incompleteReason).toBe('spawn zpool ENOENT: zpool');
  });

  it('restarts a crashed source and keeps earlier samples', async () => {
    const { collector, processes } = setup({ maxRestarts: 2 });
    await collector.start(0);
    collector.segment('1T-write');
    processes[0].emitLine(WRITE);
    await flush();

    processes[0].exit(1);
    await flush();
    expect(processes).toHaveLength(2);
    expect(collector.getRestartCount()).toBe(1);

    processes[1].emitLine(WRITE);
    await flush();
    const run = await collector.stop(0);

    expect(run.samples).toHaveLength(2);
    expect(run.restarts).toBe(1);
    expect(run.incomplete).toBe(false);
  });

  it('marks the run incomplete once restarts are exhausted', async () => {
    const { collector, processes } = setup({ maxRestarts: 2 });
    await collector.start(0);
    processes[0].emitLine(WRITE);
    await flush();

    for (let i = 0; i < 3; i++) {
      processes[i].stderr.write('cannot open pool\n');
      await flush();
      processes[i].exit(1);
      await flush();
    }
    expect(processes).toHaveLength(3);

    const run = await collector.stop(3);
    expect(run.samples).toHaveLength(1);
    expect(run.restarts).toBe(2);
    expect(run.incomplete).toBe(true);
    expect(run.incompleteReason).toBe(
      'source exited with code 1 (cannot open pool | cannot open pool | cannot open pool); gave up after 2 restarts',
    );
  });

  it('ends a cooldown early when the source dies', async () => {
    const { collector, processes } = setup();
    await collector.start(0);
    const stopping = collector.stop(3);
    processes[0].emitLine(IDLE);
    await flush();
    processes[0].exit(null, 'SIGSEGV');

    const run = await stopping;
    expect(run.cooldownCount).toBe(1);
    expect(run.incomplete).toBe(true);
    expect(run.incompleteReason).toBe('source exited with signal SIGSEGV; gave up after 0 restarts');
  });

  it('validates the pool name and interval', () => {
    expect(() => new PoolIostatCollector('-rf')).toThrow(ValidationError);
    expect(() => new PoolIostatCollector('tank', { intervalSec: 0 })).toThrow(
      'intervalSec must be a positive integer',
    );
  });
});
