/**
 * Logical scope of one run: a profile handle or a topic/category.
 */
export interface SourceEntity {
  kind: 'handle' | 'topic';
  value: string;
}

/**
 * Unresolved reference discovered while paging. `id` is the canonical URL.
 */
export interface CandidateRef {
  id: string;
  url: string;
  round: number;
}

/**
 * A link as handed back by a collector, before identity is assigned.
 */
export interface DiscoveredLink {
  url: string;
}

export type ContentKind = 'photo' | 'reel' | 'unknown';

export interface Metrics {
  likes: number;
  comments: number;
  engagementScore: number;
}

export interface ContentRecord {
  readonly id: string;
  readonly url: string;
  readonly shortcode: string | null;
  readonly sourceEntity: string;
  /** ISO-8601 text as published by the source, only set when it parses. */
  readonly timestamp: string | null;
  readonly rawText: string;
  readonly kind: ContentKind;
  readonly metrics: Metrics | null;
  readonly hashtags: readonly string[];
  readonly audioName: string | null;
}

/**
 * Raw strings pulled off an item page. Nothing here is parsed yet.
 */
export interface RawFields {
  timestampText: string | null;
  text: string;
  likesText: string | null;
  commentsText: string | null;
  audioName: string | null;
}

export interface RoundContext {
  /** 1-based round index. */
  round: number;
  admittedSoFar: number;
  signal?: AbortSignal;
}

export interface Collector {
  /**
   * Next page of links for the entity. An empty array means nothing new is
   * visible yet, not necessarily that the source is exhausted.
   */
  nextBatch(entity: SourceEntity, ctx: RoundContext): Promise<DiscoveredLink[]>;
}

export interface DetailFetcher {
  /** Rejects when the candidate's fields cannot be obtained. */
  fetch(ref: CandidateRef): Promise<RawFields>;
}

/**
 * Explicitly opened connection handle shared by a run's collaborators.
 */
export interface Session {
  open(): Promise<void>;
  close(): Promise<void>;
}

export function entityKey(entity: SourceEntity): string {
  return `${entity.kind}:${normalizeEntityValue(entity.value)}`;
}

export function normalizeEntityValue(value: string): string {
  return value.trim().replace(/^[@#]+/, '').toLowerCase();
}
