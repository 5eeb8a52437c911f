import type { CandidateRef, ContentRecord, Metrics, RawFields } from './types.js';
import { extractShortcode, kindFromUrl } from './urls.js';
import { DEFAULT_BOILERPLATE_PATTERNS } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';

const COUNT_MANTISSA = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

const ISO_ZONED =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(?:Z|[+-](\d{2}):(\d{2}))$/;

const HASHTAG = /#[\p{L}\p{N}_]+/gu;

export const DEFAULT_TRUNCATION_MARKER = ' ... [TRUNCATED]';

/**
 * Turn '12,3K', '4.5M' or '12,345' into an integer.
 * Returns null for anything unparsable so that "unknown" never reads as zero.
 */
export function parseCount(text: string | null | undefined): number | null {
  if (!text) return null;

  let value = text.trim().toLowerCase().replace(/,/g, '');
  let multiplier = 1;
  if (value.endsWith('k')) {
    multiplier = 1_000;
    value = value.slice(0, -1);
  } else if (value.endsWith('m')) {
    multiplier = 1_000_000;
    value = value.slice(0, -1);
  }
  value = value.trim();

  if (!COUNT_MANTISSA.test(value)) return null;

  const result = Number(value) * multiplier;
  return Number.isFinite(result) ? Math.trunc(result) : null;
}

/**
 * Parse an ISO-8601 date-time that carries a zone (`Z` or `±hh:mm`).
 */
export function parseTimestamp(text: string | null | undefined): Date | null {
  if (!text) return null;
  const trimmed = text.trim();
  const match = ISO_ZONED.exec(trimmed);
  if (!match) return null;

  const [, year, month, day, hour, minute, second = '0', fraction, offsetHours = '0', offsetMinutes = '0'] = match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) return null;
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) return null;
  if (Number(offsetHours) > 23 || Number(offsetMinutes) > 59) return null;

  // Date.parse only reliably takes millisecond precision.
  const normalized = fraction ? trimmed.replace(fraction, fraction.slice(0, 4)) : trimmed;
  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : new Date(ms);
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function extractHashtags(text: string): Set<string> {
  const tags = new Set<string>();
  for (const match of text.matchAll(HASHTAG)) {
    tags.add(match[0].toLowerCase());
  }
  return tags;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern, 'gi');
    } catch (err) {
      throw new ConfigError(`Invalid boilerplate pattern: ${pattern}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  });
}

export const DEFAULT_PATTERNS: readonly RegExp[] = compilePatterns(DEFAULT_BOILERPLATE_PATTERNS);

/**
 * Strip boilerplate and collapse whitespace. Passes repeat until nothing
 * changes, so cleanText(cleanText(x)) === cleanText(x).
 */
export function cleanText(text: string, patterns: readonly RegExp[] = DEFAULT_PATTERNS): string {
  if (!text) return '';

  let current = text;
  while (true) {
    let next = current;
    for (const pattern of patterns) {
      next = next.replace(pattern, '');
    }
    next = collapseWhitespace(next);
    if (next === current) return next;
    current = next;
  }
}

/**
 * Shorten text before it is handed to a downstream classifier.
 * Cuts at the earliest cut marker, then hard-truncates whatever is left at
 * maxLen code points and appends the truncation marker.
 */
export function truncateForDownstream(
  text: string,
  maxLen: number,
  cutMarkers: readonly string[],
  truncationMarker: string = DEFAULT_TRUNCATION_MARKER,
): string {
  if (!text) return '';

  let cutAt = -1;
  for (const marker of cutMarkers) {
    if (!marker) continue;
    const idx = text.indexOf(marker);
    if (idx >= 0 && (cutAt < 0 || idx < cutAt)) cutAt = idx;
  }
  const kept = cutAt >= 0 ? text.slice(0, cutAt) : text;

  const limit = Math.max(0, maxLen);
  const chars = Array.from(kept);
  if (chars.length > limit) {
    return (chars.slice(0, limit).join('') + truncationMarker).trim();
  }
  return kept.trim();
}

export function engagementScore(likes: number, comments: number): number {
  return likes + 3 * comments;
}

function buildMetrics(likes: number | null, comments: number | null): Metrics | null {
  if (likes === null && comments === null) return null;
  const l = likes ?? 0;
  const c = comments ?? 0;
  return { likes: l, comments: c, engagementScore: engagementScore(l, c) };
}

export function buildRecord(
  sourceEntity: string,
  ref: CandidateRef,
  raw: RawFields,
  patterns: readonly RegExp[] = DEFAULT_PATTERNS,
): ContentRecord {
  const rawText = cleanText(raw.text, patterns);
  const timestampText = raw.timestampText?.trim() ?? '';
  const audioName = raw.audioName ? collapseWhitespace(raw.audioName) : '';

  return {
    id: ref.id,
    url: ref.url,
    shortcode: extractShortcode(ref.url),
    sourceEntity,
    timestamp: parseTimestamp(timestampText) ? timestampText : null,
    rawText,
    kind: kindFromUrl(ref.url),
    metrics: buildMetrics(parseCount(raw.likesText), parseCount(raw.commentsText)),
    hashtags: [...extractHashtags(rawText)].sort(),
    audioName: audioName || null,
  };
}
