import { type ParsedBlock } from './poolIostatParser';
import { bytesToGiB, parseScalar, type UnitFamily } from './units';

export interface ArcMetrics {
  hitPct: number;
  missPct: number;
  arcSizeGiB: number;
  readsPerSec: number;
  hitsPerSec: number;
  missesPerSec: number;
  demandHitPct: number;
  demandMissPct: number;
  prefetchHitPct: number;
  prefetchMissPct: number;
  mfuPct: number;
  mruPct: number;
  mfuHitsPerSec: number;
  mruHitsPerSec: number;
  // present only on runs collected with hasL2ARC
  l2arcHitPct?: number;
  l2arcSizeGiB?: number;
  l2arcReadMBps?: number;
  zfetchHitsPerSec: number;
  zfetchMissesPerSec: number;
  zfetchIssuedPerSec: number;
  zfetchAheadPerSec: number;
  /** zhits / (zhits + zmisses) * 100, 0 when the prefetcher was silent. */
  zfetchHitPct: number;
}

export type ArcNumericField = Exclude<keyof ArcMetrics, 'zfetchHitPct'>;

/** (arcstat field name, metric key, unit family) */
export type ArcstatColumn = readonly [field: string, key: ArcNumericField, family: UnitFamily];

export interface ArcstatLayout {
  version: string;
  hasL2ARC: boolean;
  columns: readonly ArcstatColumn[];
}

export const ARCSTAT_LAYOUT_VERSION = 'arcstat-p/v1';

export const ARCSTAT_CORE_COLUMNS: readonly ArcstatColumn[] = [
  ['hit%', 'hitPct', 'percent'],
  ['miss%', 'missPct', 'percent'],
  ['arcsz', 'arcSizeGiB', 'size'],
  ['read', 'readsPerSec', 'count'],
  ['hits', 'hitsPerSec', 'count'],
  ['miss', 'missesPerSec', 'count'],
  ['dh%', 'demandHitPct', 'percent'],
  ['dm%', 'demandMissPct', 'percent'],
  ['ph%', 'prefetchHitPct', 'percent'],
  ['pm%', 'prefetchMissPct', 'percent'],
  ['mfusz%', 'mfuPct', 'percent'],
  ['mrusz%', 'mruPct', 'percent'],
  ['mfu', 'mfuHitsPerSec', 'count'],
  ['mru', 'mruHitsPerSec', 'count'],
];

// arcstat rejects these on systems without a cache device
export const ARCSTAT_L2ARC_COLUMNS: readonly ArcstatColumn[] = [
  ['l2hit%', 'l2arcHitPct', 'percent'],
  ['l2size', 'l2arcSizeGiB', 'size'],
  ['l2bytes', 'l2arcReadMBps', 'bandwidth'],
];

export const ARCSTAT_ZFETCH_COLUMNS: readonly ArcstatColumn[] = [
  ['zhits', 'zfetchHitsPerSec', 'count'],
  ['zmisses', 'zfetchMissesPerSec', 'count'],
  ['zissued', 'zfetchIssuedPerSec', 'count'],
  ['zahead', 'zfetchAheadPerSec', 'count'],
];

const GIB_KEYS: ReadonlySet<ArcNumericField> = new Set<ArcNumericField>([
  'arcSizeGiB',
  'l2arcSizeGiB',
]);

export function buildArcstatLayout(hasL2ARC: boolean): ArcstatLayout {
  const columns = [
    ...ARCSTAT_CORE_COLUMNS,
    ...(hasL2ARC ? ARCSTAT_L2ARC_COLUMNS : []),
    ...ARCSTAT_ZFETCH_COLUMNS,
  ];
  return Object.freeze({
    version: ARCSTAT_LAYOUT_VERSION,
    hasL2ARC,
    columns: Object.freeze(columns),
  });
}

/** Comma separated `-f` argument for the layout. */
export const arcstatFieldList = (layout: ArcstatLayout): string =>
  layout.columns.map(([field]) => field).join(',');

export function zfetchHitPct(hits: number, misses: number): number {
  const total = hits + misses;
  return total > 0 ? (hits / total) * 100 : 0;
}

/**
 * Parses one line of `arcstat -p -f ...` output. Header lines (arcstat
 * reprints them periodically) and short lines return null.
 */
export function parseArcstatBlock(
  block: string,
  layout: ArcstatLayout,
): ParsedBlock<ArcMetrics> | null {
  const stripped = block.trim();
  if (!stripped) return null;
  const tokens = stripped.split(/\s+/);

  const fieldNames = new Set(layout.columns.map(([field]) => field));
  if (tokens.some(token => fieldNames.has(token))) return null;
  if (tokens.length < layout.columns.length) return null;

  const metrics: ArcMetrics = {
    hitPct: 0,
    missPct: 0,
    arcSizeGiB: 0,
    readsPerSec: 0,
    hitsPerSec: 0,
    missesPerSec: 0,
    demandHitPct: 0,
    demandMissPct: 0,
    prefetchHitPct: 0,
    prefetchMissPct: 0,
    mfuPct: 0,
    mruPct: 0,
    mfuHitsPerSec: 0,
    mruHitsPerSec: 0,
    zfetchHitsPerSec: 0,
    zfetchMissesPerSec: 0,
    zfetchIssuedPerSec: 0,
    zfetchAheadPerSec: 0,
    zfetchHitPct: 0,
  };
  if (layout.hasL2ARC) {
    metrics.l2arcHitPct = 0;
    metrics.l2arcSizeGiB = 0;
    metrics.l2arcReadMBps = 0;
  }

  const warnings: string[] = [];
  layout.columns.forEach(([field, key, family], i) => {
    const parsed = parseScalar(tokens[i], family);
    metrics[key] = GIB_KEYS.has(key) ? bytesToGiB(parsed.value) : parsed.value;
    if (parsed.warning) warnings.push(`${field}: ${parsed.warning}`);
  });
  metrics.zfetchHitPct = zfetchHitPct(metrics.zfetchHitsPerSec, metrics.zfetchMissesPerSec);

  return { metrics, warnings };
}
