import type {
  CandidateRef,
  Collector,
  ContentRecord,
  DetailFetcher,
  Session,
  SourceEntity,
} from '../discovery/types.js';
import { entityKey } from '../discovery/types.js';
import type { DedupStore } from '../discovery/dedupStore.js';
import { PaginationController, type ControllerState } from '../discovery/paginate.js';
import { buildRecord, DEFAULT_PATTERNS } from '../discovery/normalize.js';
import { createPinnedFilter, createRecencyFilter, type AdmissionFilter, type PinnedPredicate } from './admission.js';
import { COMPARATORS, selectTop } from './rank.js';
import type { RankedResultSet, ResultParams } from './result.js';
import type { PaginationMode } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { withConcurrency } from '../shared/utils.js';

export interface RunCollaborators {
  collector: Collector;
  fetcher: DetailFetcher;
  store: DedupStore;
  session?: Session;
}

export type StrategySpec =
  | { name: 'chronological'; limit: number; isPinned?: PinnedPredicate }
  | { name: 'engagement'; limit: number; maxAgeHours: number };

export interface RunOptions {
  entity: SourceEntity;
  strategy: StrategySpec;
  targetNewCount: number;
  mode: PaginationMode;
  stagnationLimit?: number;
  roundCap?: number;
  concurrency?: number;
  patterns?: readonly RegExp[];
  hashtags?: string[];
  signal?: AbortSignal;
  now?: () => Date;
}

export interface RunStats {
  state: ControllerState;
  rounds: number;
  candidates: number;
  resolved: number;
  unresolved: number;
  filteredOut: number;
  persisted: number;
  storeFailures: number;
  collectionErrors: number;
  durationMs: number;
}

export interface UnresolvedCandidate {
  id: string;
  url: string;
  error: string;
}

export interface RunReport {
  result: RankedResultSet;
  stats: RunStats;
  unresolved: UnresolvedCandidate[];
}

function admissionFor(strategy: StrategySpec, now: Date): AdmissionFilter {
  switch (strategy.name) {
    case 'chronological':
      return createPinnedFilter(strategy.isPinned);
    case 'engagement':
      return createRecencyFilter({ now, maxAgeHours: strategy.maxAgeHours });
  }
}

function paramsFor(options: RunOptions): ResultParams {
  const params: ResultParams = { limit: options.strategy.limit, targetNewCount: options.targetNewCount };
  if (options.strategy.name === 'engagement') {
    params.maxAgeHours = options.strategy.maxAgeHours;
  }
  if (options.hashtags) {
    params.hashtags = options.hashtags;
  }
  return params;
}

/**
 * One discovery run: page for new candidates, resolve and normalize them,
 * apply the strategy's admission rule, rank and keep the top N.
 *
 * Never fails on collaborator errors; an empty result set is a valid outcome.
 */
export async function runDiscovery(collab: RunCollaborators, options: RunOptions): Promise<RunReport> {
  const startTime = Date.now();
  const now = options.now ?? (() => new Date());
  const key = entityKey(options.entity);
  const patterns = options.patterns ?? DEFAULT_PATTERNS;

  const stats: RunStats = {
    state: 'COLLECTING',
    rounds: 0,
    candidates: 0,
    resolved: 0,
    unresolved: 0,
    filteredOut: 0,
    persisted: 0,
    storeFailures: 0,
    collectionErrors: 0,
    durationMs: 0,
  };
  const records: ContentRecord[] = [];
  const unresolved: UnresolvedCandidate[] = [];

  let known: Set<string>;
  try {
    known = collab.store.load(key);
  } catch (err) {
    stats.storeFailures++;
    known = new Set();
    logger.warn({ entity: key, error: errorMessage(err) }, 'Seen-item store unavailable, starting empty');
  }
  logger.info({ entity: key, known: known.size }, 'Run starting');

  const resolve = async (ref: CandidateRef): Promise<void> => {
    let record: ContentRecord;
    try {
      const raw = await collab.fetcher.fetch(ref);
      record = buildRecord(key, ref, raw, patterns);
    } catch (err) {
      stats.unresolved++;
      unresolved.push({ id: ref.id, url: ref.url, error: errorMessage(err) });
      logger.warn({ url: ref.url, error: errorMessage(err) }, 'Detail fetch failed, dropping candidate');
      return;
    }

    stats.resolved++;
    records.push(record);

    try {
      if (collab.store.insertIfAbsent(key, ref.id, record.timestamp)) {
        stats.persisted++;
      }
    } catch (err) {
      stats.storeFailures++;
      logger.warn({ url: ref.url, error: errorMessage(err) }, 'Could not record seen item');
    }
  };

  await collab.session?.open();
  try {
    const controller = new PaginationController(collab.collector, options.entity, known, {
      targetNewCount: options.targetNewCount,
      mode: options.mode,
      stagnationLimit: options.stagnationLimit,
      roundCap: options.roundCap,
      signal: options.signal,
      onRound: (admitted) => withConcurrency(admitted, options.concurrency ?? 4, resolve),
    });
    const paging = await controller.run();
    stats.state = paging.state;
    stats.rounds = paging.rounds;
    stats.candidates = paging.admitted.length;
    stats.collectionErrors = paging.collectionErrors;
  } finally {
    await collab.session?.close();
  }

  const generatedAt = now();
  const admit = admissionFor(options.strategy, generatedAt);
  const survivors = records.filter(admit);
  stats.filteredOut = records.length - survivors.length;

  const result: RankedResultSet = {
    sourceEntity: options.entity,
    generatedAt: generatedAt.toISOString(),
    strategy: options.strategy.name,
    params: paramsFor(options),
    records: selectTop(survivors, COMPARATORS[options.strategy.name], options.strategy.limit),
  };

  stats.durationMs = Date.now() - startTime;
  logger.info(
    {
      entity: key,
      state: stats.state,
      candidates: stats.candidates,
      resolved: stats.resolved,
      filteredOut: stats.filteredOut,
      returned: result.records.length,
      durationMs: stats.durationMs,
    },
    'Run complete',
  );

  return { result, stats, unresolved };
}
