import type { ContentKind } from './types.js';

const TRACKING_PREFIXES = ['utm_', 'mc_'];
const TRACKING_KEYS = new Set(['igsh', 'igshid', 'fbclid', 'gclid', 'ref', 'source']);

function isTrackingParam(key: string): boolean {
  const lower = key.toLowerCase();
  return TRACKING_KEYS.has(lower) || TRACKING_PREFIXES.some((p) => lower.startsWith(p));
}

/**
 * Canonical form of an item URL, used as its dedup identity:
 * - lowercase scheme + host, drop www.
 * - remove tracking params, sort the rest
 * - drop the fragment
 * - keep exactly one trailing slash on non-root paths
 */
export function canonicalUrl(raw: string, base?: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim(), base);
  } catch {
    return raw.trim();
  }

  url.hostname = url.hostname.toLowerCase();
  if (url.hostname.startsWith('www.')) {
    url.hostname = url.hostname.slice(4);
  }

  const keysToRemove: string[] = [];
  for (const key of url.searchParams.keys()) {
    if (isTrackingParam(key)) {
      keysToRemove.push(key);
    }
  }
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }
  url.searchParams.sort();

  let pathname = url.pathname.replace(/\/+$/, '');
  pathname = pathname === '' ? '' : `${pathname}/`;

  const search = url.searchParams.toString();
  return `${url.protocol}//${url.hostname}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}

export function kindFromUrl(url: string): ContentKind {
  if (url.includes('/reel/')) return 'reel';
  if (url.includes('/p/')) return 'photo';
  return 'unknown';
}

export function extractShortcode(url: string): string | null {
  const match = /\/(?:reel|p)\/([^/?#]+)/.exec(url);
  return match?.[1] ?? null;
}
