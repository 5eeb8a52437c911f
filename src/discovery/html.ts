import { JSDOM } from 'jsdom';
import type {
  CandidateRef,
  Collector,
  DetailFetcher,
  DiscoveredLink,
  RawFields,
  RoundContext,
  SourceEntity,
} from './types.js';
import { normalizeEntityValue } from './types.js';
import type { HttpSession } from './session.js';
import type { Config } from '../shared/config.js';
import { CollectionError, ConfigError, DetailFetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface ListingSelectors {
  link: string;
  next: string;
}

export interface ItemSelectors {
  timestamp: string;
  text: string;
  audio: string;
}

const LIKES = /(\d[\d.,]*\s?[km]?)\s+likes?\b/i;
const COMMENTS = /(\d[\d.,]*\s?[km]?)\s+comments?\b/i;

/**
 * Text of every non-empty text node under root, one per line, skipping
 * script and style content.
 */
export function visibleText(dom: JSDOM, root: Element | null): string {
  if (!root) return '';
  const walker = dom.window.document.createTreeWalker(root, dom.window.NodeFilter.SHOW_TEXT);
  const parts: string[] = [];
  let node = walker.nextNode();
  while (node) {
    const parent = node.parentElement?.tagName;
    const value = node.textContent?.trim() ?? '';
    if (value && parent !== 'SCRIPT' && parent !== 'STYLE') {
      parts.push(value);
    }
    node = walker.nextNode();
  }
  return parts.join('\n');
}

export function parseListingPage(
  html: string,
  pageUrl: string,
  selectors: ListingSelectors,
): { links: DiscoveredLink[]; next: string | null } {
  const dom = new JSDOM(html, { url: pageUrl });
  try {
    const doc = dom.window.document;
    const links: DiscoveredLink[] = [];
    for (const anchor of doc.querySelectorAll(selectors.link)) {
      const href = anchor.getAttribute('href');
      if (!href) continue;
      try {
        links.push({ url: new URL(href, pageUrl).toString() });
      } catch {
        logger.debug({ href, pageUrl }, 'Skipping unresolvable link');
      }
    }

    const nextHref = doc.querySelector(selectors.next)?.getAttribute('href');
    let next: string | null = null;
    if (nextHref) {
      try {
        next = new URL(nextHref, pageUrl).toString();
      } catch {
        next = null;
      }
    }
    return { links, next };
  } finally {
    dom.window.close();
  }
}

export function parseItemPage(html: string, pageUrl: string, selectors: ItemSelectors): RawFields {
  const dom = new JSDOM(html, { url: pageUrl });
  try {
    const doc = dom.window.document;
    const bodyText = visibleText(dom, doc.body).replace(/\s+/g, ' ');
    const textRoot = doc.querySelector(selectors.text) ?? doc.body;
    const audio = doc.querySelector(selectors.audio);

    return {
      timestampText: doc.querySelector(selectors.timestamp)?.getAttribute('datetime') ?? null,
      text: visibleText(dom, textRoot),
      likesText: LIKES.exec(bodyText)?.[1] ?? null,
      commentsText: COMMENTS.exec(bodyText)?.[1] ?? null,
      audioName: audio ? visibleText(dom, audio) || null : null,
    };
  } finally {
    dom.window.close();
  }
}

/**
 * Walks a queue of listing pages, one page per round, following each page's
 * "next" link before moving on to the following listing.
 */
export class ListingCollector implements Collector {
  private readonly queue: string[];
  private readonly visited = new Set<string>();

  constructor(
    private readonly session: HttpSession,
    listingUrls: string[],
    private readonly selectors: ListingSelectors,
  ) {
    this.queue = [...listingUrls];
  }

  async nextBatch(entity: SourceEntity, ctx: RoundContext): Promise<DiscoveredLink[]> {
    if (ctx.signal?.aborted) return [];
    const pageUrl = this.queue.shift();
    if (!pageUrl) return [];
    this.visited.add(pageUrl);

    let html: string;
    try {
      html = await this.session.getHtml(pageUrl, ctx.signal);
    } catch (err) {
      throw new CollectionError(`Listing page failed: ${errorMessage(err)}`, {
        entity: entity.value,
        url: pageUrl,
        round: ctx.round,
      });
    }

    const { links, next } = parseListingPage(html, pageUrl, this.selectors);
    if (next && !this.visited.has(next) && !this.queue.includes(next)) {
      this.queue.unshift(next);
    }
    return links;
  }
}

export class HtmlDetailFetcher implements DetailFetcher {
  constructor(
    private readonly session: HttpSession,
    private readonly selectors: ItemSelectors,
  ) {}

  async fetch(ref: CandidateRef): Promise<RawFields> {
    let html: string;
    try {
      html = await this.session.getHtml(ref.url);
    } catch (err) {
      throw new DetailFetchError(`Item page failed: ${errorMessage(err)}`, { url: ref.url });
    }
    return parseItemPage(html, ref.url, this.selectors);
  }
}

function fillTemplate(template: string, key: string, value: string): string {
  return template.split(`{${key}}`).join(encodeURIComponent(value));
}

/**
 * Listing pages for an entity: the profile page for a handle, one tag page
 * per hashtag for a topic.
 */
export function listingUrlsFor(
  entity: SourceEntity,
  collector: Config['collector'],
  hashtags: string[] = [],
): string[] {
  if (!collector.base_url) {
    throw new ConfigError('collector.base_url is not configured');
  }
  const base = collector.base_url.replace(/\/+$/, '');

  if (entity.kind === 'handle') {
    return [base + fillTemplate(collector.profile_path, 'handle', normalizeEntityValue(entity.value))];
  }
  return hashtags.map((tag) => base + fillTemplate(collector.tag_path, 'tag', normalizeEntityValue(tag)));
}

export function selectorsFromConfig(collector: Config['collector']): {
  listing: ListingSelectors;
  item: ItemSelectors;
} {
  return {
    listing: { link: collector.link_selector, next: collector.next_selector },
    item: {
      timestamp: collector.timestamp_selector,
      text: collector.text_selector,
      audio: collector.audio_selector,
    },
  };
}
