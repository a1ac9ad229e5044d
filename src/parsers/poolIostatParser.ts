/**
 * Parser for `zpool iostat -H -y -l <pool> <interval>` output.
 *
 * The column layout is a fixed contract. Latency columns are interleaved
 * read/write PAIRS per wait type (total r, total w, disk r, disk w, ...),
 * not all reads followed by all writes. Any change to the tool's output
 * needs a new layout version, never a heuristic.
 */

import { parseScalar, type UnitFamily } from './units';

export type IoDirection = 'read' | 'write' | 'none';

export interface PoolIostatMetrics {
  poolName: string;
  allocBytes: number;
  freeBytes: number;
  readIOPS: number;
  writeIOPS: number;
  readBandwidthMBps: number;
  writeBandwidthMBps: number;
  readTotalWaitMs: number;
  writeTotalWaitMs: number;
  readDiskWaitMs: number;
  writeDiskWaitMs: number;
  readSyncQueueWaitMs: number;
  writeSyncQueueWaitMs: number;
  readAsyncQueueWaitMs: number;
  writeAsyncQueueWaitMs: number;
  scrubWaitMs: number;
  trimWaitMs: number;
}

export type PoolIostatNumericField = Exclude<keyof PoolIostatMetrics, 'poolName'>;

/** (fieldName, direction, unit family) for one column. */
export type PoolIostatColumn = readonly [
  field: PoolIostatNumericField,
  direction: IoDirection,
  family: UnitFamily,
];

export interface PoolIostatLayout {
  version: string;
  /** Columns required for a line to count as a data line (name through bandwidth). */
  minColumns: number;
  /** Column 0 is always the pool name; entries map columns 1..n. */
  columns: readonly PoolIostatColumn[];
}

export const ZPOOL_IOSTAT_LAYOUT_V1: PoolIostatLayout = Object.freeze({
  version: 'zpool-iostat-l/v1',
  minColumns: 7,
  columns: Object.freeze([
    ['allocBytes', 'none', 'size'],
    ['freeBytes', 'none', 'size'],
    ['readIOPS', 'read', 'count'],
    ['writeIOPS', 'write', 'count'],
    ['readBandwidthMBps', 'read', 'bandwidth'],
    ['writeBandwidthMBps', 'write', 'bandwidth'],
    ['readTotalWaitMs', 'read', 'latency'],
    ['writeTotalWaitMs', 'write', 'latency'],
    ['readDiskWaitMs', 'read', 'latency'],
    ['writeDiskWaitMs', 'write', 'latency'],
    ['readSyncQueueWaitMs', 'read', 'latency'],
    ['writeSyncQueueWaitMs', 'write', 'latency'],
    ['readAsyncQueueWaitMs', 'read', 'latency'],
    ['writeAsyncQueueWaitMs', 'write', 'latency'],
    ['scrubWaitMs', 'none', 'latency'],
    ['trimWaitMs', 'none', 'latency'],
  ] as const),
});

export interface ParsedBlock<TMetrics> {
  metrics: TMetrics;
  warnings: string[];
}

const emptyPoolMetrics = (poolName: string): PoolIostatMetrics => ({
  poolName,
  allocBytes: 0,
  freeBytes: 0,
  readIOPS: 0,
  writeIOPS: 0,
  readBandwidthMBps: 0,
  writeBandwidthMBps: 0,
  readTotalWaitMs: 0,
  writeTotalWaitMs: 0,
  readDiskWaitMs: 0,
  writeDiskWaitMs: 0,
  readSyncQueueWaitMs: 0,
  writeSyncQueueWaitMs: 0,
  readAsyncQueueWaitMs: 0,
  writeAsyncQueueWaitMs: 0,
  scrubWaitMs: 0,
  trimWaitMs: 0,
});

const isOperationColumn = ([field]: PoolIostatColumn) =>
  field === 'readIOPS' || field === 'writeIOPS';

const HEADER_NAMES: ReadonlySet<string> = new Set(['pool', 'name']);

/**
 * Headers and separators by shape: a column title or dashes up front, or no
 * operation count that even starts like a number. A data line with one bad
 * count still passes and gets a field warning.
 */
function isHeaderOrSeparator(tokens: readonly string[], layout: PoolIostatLayout): boolean {
  const first = tokens[0];
  if (HEADER_NAMES.has(first.toLowerCase()) || first.startsWith('-')) return true;
  const opsTokens = layout.columns
    .map((column, i) => (isOperationColumn(column) ? tokens[i + 1] : undefined))
    .filter((token): token is string => token !== undefined);
  return !opsTokens.some(token => /^\d/.test(token));
}

/**
 * Parses one output block (one line per pool per interval).
 * Returns null for blank, header and separator lines.
 */
export function parsePoolIostatBlock(
  block: string,
  layout: PoolIostatLayout = ZPOOL_IOSTAT_LAYOUT_V1,
): ParsedBlock<PoolIostatMetrics> | null {
  const tokens = block.trim().split(/\s+/);
  if (tokens.length < layout.minColumns) return null;

  if (isHeaderOrSeparator(tokens, layout)) return null;

  const metrics = emptyPoolMetrics(tokens[0]);
  const warnings: string[] = [];
  layout.columns.forEach(([field, , family], i) => {
    const token = tokens[i + 1];
    if (token === undefined) {
      warnings.push(`${field}: missing column ${i + 1}`);
      return;
    }
    const parsed = parseScalar(token, family);
    metrics[field] = parsed.value;
    if (parsed.warning) warnings.push(`${field}: ${parsed.warning}`);
  });

  return { metrics, warnings };
}
