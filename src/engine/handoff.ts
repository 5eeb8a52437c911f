import type { Config } from '../shared/config.js';
import { truncateForDownstream } from '../discovery/normalize.js';
import type { RankedResultSet } from './result.js';

export interface HandoffItem {
  id: string;
  url: string;
  text: string;
}

/**
 * Per-record text sized for a downstream classifier.
 */
export function buildHandoff(result: RankedResultSet, handoff: Config['handoff']): HandoffItem[] {
  return result.records.map((record) => ({
    id: record.id,
    url: record.url,
    text: truncateForDownstream(record.rawText, handoff.max_len, handoff.cut_markers, handoff.truncation_marker),
  }));
}

export function toJsonLines(items: HandoffItem[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n');
}
