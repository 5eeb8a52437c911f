import type { ContentRecord } from '../discovery/types.js';
import { engagementScore, parseTimestamp } from '../discovery/normalize.js';

export type StrategyName = 'chronological' | 'engagement';

export type Comparator = (a: ContentRecord, b: ContentRecord) => number;

function timestampMs(record: ContentRecord): number | null {
  return parseTimestamp(record.timestamp)?.getTime() ?? null;
}

/** Descending order with absent values last. */
function compareDesc(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

function byId(a: ContentRecord, b: ContentRecord): number {
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Score from the record's likes and comments; any upstream score is ignored.
 */
export function scoreOf(record: ContentRecord): number | null {
  if (!record.metrics) return null;
  return engagementScore(record.metrics.likes, record.metrics.comments);
}

export const chronological: Comparator = (a, b) =>
  compareDesc(timestampMs(a), timestampMs(b)) || byId(a, b);

export const engagement: Comparator = (a, b) =>
  compareDesc(scoreOf(a), scoreOf(b)) || compareDesc(timestampMs(a), timestampMs(b)) || byId(a, b);

export const COMPARATORS: Record<StrategyName, Comparator> = {
  chronological,
  engagement,
};

/**
 * First min(n, survivors) records in comparator order. Never pads.
 */
export function selectTop(
  records: readonly ContentRecord[],
  comparator: Comparator,
  n: number,
): ContentRecord[] {
  return [...records].sort(comparator).slice(0, Math.max(0, Math.floor(n)));
}
