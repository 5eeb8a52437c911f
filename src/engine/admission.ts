import type { ContentRecord } from '../discovery/types.js';
import { parseTimestamp } from '../discovery/normalize.js';

export type AdmissionFilter = (record: ContentRecord) => boolean;

export type PinnedPredicate = (record: ContentRecord) => boolean;

/**
 * Pinned items tend to carry a missing or non-UTC timestamp. Anything that is
 * not in strict zero-offset form is treated as pinned. Known to misfire on
 * genuine items published with an explicit offset.
 */
export const isLikelyPinned: PinnedPredicate = (record) =>
  record.timestamp === null || !record.timestamp.endsWith('Z');

export function createPinnedFilter(isPinned: PinnedPredicate = isLikelyPinned): AdmissionFilter {
  return (record) => !isPinned(record);
}

export interface RecencyWindow {
  now: Date;
  maxAgeHours: number;
}

const HOUR_MS = 3_600_000;

export function ageHours(record: ContentRecord, now: Date): number | null {
  const published = parseTimestamp(record.timestamp);
  if (!published) return null;
  return (now.getTime() - published.getTime()) / HOUR_MS;
}

/**
 * Admits records no older than maxAgeHours. The boundary is inclusive: a
 * record aged exactly maxAgeHours is kept. Future timestamps are kept.
 */
export function createRecencyFilter(window: RecencyWindow): AdmissionFilter {
  return (record) => {
    const age = ageHours(record, window.now);
    return age !== null && age <= window.maxAgeHours;
  };
}
