/**
 * Suffix-aware scalar parsing shared by the zpool iostat and arcstat parsers.
 *
 * Every family has one canonical unit:
 * - count:     plain number, K/M/G/T/P are powers of 1000 (operation counts)
 * - size:      bytes, K/M/G/T/P/E are powers of 1024 (ZFS nicenum)
 * - bandwidth: MB/s, token is bytes per second with 1024-based suffixes
 * - latency:   milliseconds, token carries ns/us/ms/s; a bare number is nanoseconds (`-p` output)
 * - percent:   percentage points, optional trailing `%`
 */

export type UnitFamily = 'count' | 'size' | 'bandwidth' | 'latency' | 'percent';

export interface ParsedScalar {
  value: number;
  /** Set when the token could not be parsed; value is then 0. */
  warning?: string;
}

const BYTES_PER_MB = 1024 * 1024;
const BYTES_PER_GIB = 1024 * 1024 * 1024;

const TOKEN_RE = /^(-?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)([A-Za-zµμ%]*)$/;

const DECIMAL_SUFFIXES: Record<string, number> = {
  '': 1,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
};

const BINARY_SUFFIXES: Record<string, number> = {
  '': 1,
  B: 1,
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
  P: 1024 ** 5,
  E: 1024 ** 6,
};

// value in the given suffix -> milliseconds, as [multiply, divide]
const TIME_SUFFIXES: Record<string, [number, number]> = {
  '': [1, 1e6],
  ns: [1, 1e6],
  us: [1, 1e3],
  'µs': [1, 1e3],
  'μs': [1, 1e3],
  ms: [1, 1],
  s: [1000, 1],
};

export const bytesPerSecToMBps = (bytesPerSec: number): number =>
  bytesPerSec / BYTES_PER_MB;

export const bytesToGiB = (bytes: number): number => bytes / BYTES_PER_GIB;

export const nsToMs = (ns: number): number => ns / 1e6;

function binarySuffix(suffix: string): number | undefined {
  // accept "K", "KB", "KiB"
  const key = suffix.replace(/i?B$/, '') || (suffix === 'B' ? 'B' : '');
  return BINARY_SUFFIXES[key.toUpperCase()];
}

function scale(number: number, suffix: string, family: UnitFamily): number | undefined {
  switch (family) {
    case 'count': {
      const mult = DECIMAL_SUFFIXES[suffix.toUpperCase()];
      return mult === undefined ? undefined : number * mult;
    }
    case 'size': {
      const mult = binarySuffix(suffix);
      return mult === undefined ? undefined : number * mult;
    }
    case 'bandwidth': {
      const mult = binarySuffix(suffix);
      return mult === undefined ? undefined : bytesPerSecToMBps(number * mult);
    }
    case 'latency': {
      const factors = TIME_SUFFIXES[suffix];
      return factors === undefined ? undefined : (number * factors[0]) / factors[1];
    }
    case 'percent':
      return suffix === '' || suffix === '%' ? number : undefined;
  }
}

/**
 * Parses one column token into the canonical unit of its family.
 * `-` is the tools' "no data" marker and reads as 0 without a warning.
 */
export function parseScalar(token: string | undefined, family: UnitFamily): ParsedScalar {
  if (token === undefined || token.trim() === '') {
    return { value: 0, warning: 'missing value' };
  }
  const trimmed = token.trim();
  if (trimmed === '-') return { value: 0 };

  const match = TOKEN_RE.exec(trimmed);
  if (!match) {
    return { value: 0, warning: `malformed token "${trimmed}"` };
  }
  const number = Number(match[1]);
  const scaled = scale(number, match[2], family);
  if (scaled === undefined || !Number.isFinite(scaled)) {
    return { value: 0, warning: `unknown ${family} suffix in "${trimmed}"` };
  }
  return { value: scaled };
}
