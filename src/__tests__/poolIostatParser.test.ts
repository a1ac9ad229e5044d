import { ZPOOL_IOSTAT_LAYOUT_V1, parsePoolIostatBlock } from '../parsers/poolIostatParser';

const TIB = 1024 ** 4;

// name alloc free | ops r/w | bw r/w | total r/w | disk r/w | syncq r/w | asyncq r/w | scrub trim
const LINE = [
  'tank',
  '1.50T',
  '2.00T',
  '120',
  '340',
  '15.0M',
  '42.0M',
  '1ms',
  '3ms',
  '800us',
  '2ms',
  '10us',
  '50us',
  '20us',
  '900us',
  '-',
  '-',
].join('\t');

describe('parsePoolIostatBlock', () => {
  it('maps every column of a data line', () => {
    const parsed = parsePoolIostatBlock(LINE);
    expect(parsed).not.toBeNull();
    if (!parsed) return;

    const m = parsed.metrics;
    expect(parsed.warnings).toEqual([]);
    expect(m.poolName).toBe('tank');
    expect(m.allocBytes).toBe(1.5 * TIB);
    expect(m.freeBytes).toBe(2 * TIB);
    expect(m.readIOPS).toBe(120);
    expect(m.writeIOPS).toBe(340);
    expect(m.readBandwidthMBps).toBe(15);
    expect(m.writeBandwidthMBps).toBe(42);
    expect(m.readTotalWaitMs).toBe(1);
    expect(m.writeTotalWaitMs).toBe(3);
    expect(m.readDiskWaitMs).toBeCloseTo(0.8, 10);
    expect(m.writeDiskWaitMs).toBe(2);
    expect(m.readSyncQueueWaitMs).toBeCloseTo(0.01, 10);
    expect(m.writeSyncQueueWaitMs).toBeCloseTo(0.05, 10);
    expect(m.readAsyncQueueWaitMs).toBeCloseTo(0.02, 10);
    expect(m.writeAsyncQueueWaitMs).toBeCloseTo(0.9, 10);
    expect(m.scrubWaitMs).toBe(0);
    expect(m.trimWaitMs).toBe(0);
  });

  it('reads latency columns as interleaved read/write pairs', () => {
    const parsed = parsePoolIostatBlock(LINE);
    // column 8 is total_wait write, not disk_wait read
    expect(parsed?.metrics.writeTotalWaitMs).toBe(3);
    expect(parsed?.metrics.readDiskWaitMs).toBeCloseTo(0.8, 10);
  });

  it('parses exact (-p) output with nanosecond latencies', () => {
    const exact = [
      'tank',
      String(TIB),
      String(3 * TIB),
      '10',
      '20',
      '1048576',
      '2097152',
      '1000000',
      '4000000',
      '500000',
      '0',
      '0',
      '0',
      '0',
      '0',
      '0',
      '0',
    ].join(' ');
    const parsed = parsePoolIostatBlock(exact);
    expect(parsed?.metrics.allocBytes).toBe(TIB);
    expect(parsed?.metrics.readBandwidthMBps).toBe(1);
    expect(parsed?.metrics.writeBandwidthMBps).toBe(2);
    expect(parsed?.metrics.readTotalWaitMs).toBe(1);
    expect(parsed?.metrics.writeTotalWaitMs).toBe(4);
    expect(parsed?.metrics.readDiskWaitMs).toBe(0.5);
  });

  it('skips header, separator, blank and short lines', () => {
    expect(parsePoolIostatBlock('pool alloc free read write read write')).toBeNull();
    expect(
      parsePoolIostatBlock('------ ----- ----- ----- ----- ----- ----- ----- -----'),
    ).toBeNull();
    expect(parsePoolIostatBlock('')).toBeNull();
    expect(parsePoolIostatBlock('tank 1T 2T 10 20')).toBeNull();
  });

  it('skips lines whose operation counts are the no-data marker', () => {
    expect(parsePoolIostatBlock('tank 1T 2T - - 0 0')).toBeNull();
  });

  it('keeps a data line whose operation counts are garbled', () => {
    const parsed = parsePoolIostatBlock('tank 1T 2T 12x 340 15M 42M 1ms 3ms - - - - - - - -');
    expect(parsed).not.toBeNull();
    expect(parsed?.metrics.readIOPS).toBe(0);
    expect(parsed?.metrics.writeIOPS).toBe(340);
    expect(parsed?.metrics.writeBandwidthMBps).toBe(42);
    expect(parsed?.warnings).toEqual(['readIOPS: unknown count suffix in "12x"']);

    const both = parsePoolIostatBlock('tank 1T 2T 12x 3a4 15M 42M 1ms 3ms - - - - - - - -');
    expect(both?.metrics.readBandwidthMBps).toBe(15);
    expect(both?.warnings).toEqual([
      'readIOPS: unknown count suffix in "12x"',
      'writeIOPS: malformed token "3a4"',
    ]);
  });

  it('skips column titles whatever their case', () => {
    expect(parsePoolIostatBlock('NAME alloc free read write read write total disk')).toBeNull();
  });

  it('reports missing latency columns on short data lines', () => {
    const parsed = parsePoolIostatBlock('tank 1T 2T 10 20 1M 2M');
    expect(parsed?.metrics.writeBandwidthMBps).toBe(2);
    expect(parsed?.metrics.readTotalWaitMs).toBe(0);
    expect(parsed?.warnings).toHaveLength(10);
    expect(parsed?.warnings[0]).toBe('readTotalWaitMs: missing column 7');
    expect(parsed?.warnings[9]).toBe('trimWaitMs: missing column 16');
  });

  it('keeps the sample and records a warning for a malformed field', () => {
    const parsed = parsePoolIostatBlock(LINE.replace('1ms', 'abc'));
    expect(parsed?.metrics.readTotalWaitMs).toBe(0);
    expect(parsed?.metrics.writeTotalWaitMs).toBe(3);
    expect(parsed?.warnings).toEqual(['readTotalWaitMs: malformed token "abc"']);
  });

  it('describes the fixed layout', () => {
    expect(ZPOOL_IOSTAT_LAYOUT_V1.version).toBe('zpool-iostat-l/v1');
    expect(ZPOOL_IOSTAT_LAYOUT_V1.columns).toHaveLength(16);
    expect(ZPOOL_IOSTAT_LAYOUT_V1.columns[7]).toEqual(['writeTotalWaitMs', 'write', 'latency']);
  });
});
