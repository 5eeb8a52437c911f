import type Database from 'better-sqlite3';
import type { Collector, DetailFetcher, Session, SourceEntity } from '../discovery/types.js';
import { NullDedupStore, SqliteDedupStore } from '../discovery/dedupStore.js';
import { compilePatterns } from '../discovery/normalize.js';
import { HttpSession } from '../discovery/session.js';
import {
  HtmlDetailFetcher,
  ListingCollector,
  listingUrlsFor,
  selectorsFromConfig,
} from '../discovery/html.js';
import { runDiscovery, type RunReport } from './run.js';
import { saveRun, writeResultFile } from './output.js';
import type { Config } from '../shared/config.js';
import { loadCategoryPresets, resolveCategory } from '../shared/categories.js';
import { logger } from '../shared/logger.js';

export interface CollaboratorSet {
  collector: Collector;
  fetcher: DetailFetcher;
  session?: Session;
}

export type CollaboratorFactory = (
  entity: SourceEntity,
  config: Config,
  hashtags: string[],
) => CollaboratorSet;

export const httpCollaborators: CollaboratorFactory = (entity, config, hashtags) => {
  const session = HttpSession.fromConfig(config.collector);
  const selectors = selectorsFromConfig(config.collector);
  return {
    session,
    collector: new ListingCollector(session, listingUrlsFor(entity, config.collector, hashtags), selectors.listing),
    fetcher: new HtmlDetailFetcher(session, selectors.item),
  };
};

interface CommonRunOptions {
  /** Skip the seen-item store and the run history. */
  dryRun?: boolean;
  /** Write the result set to a JSON file under output.data_dir. */
  writeFile?: boolean;
  signal?: AbortSignal;
  collaborators?: CollaboratorFactory;
}

export interface ProfileRunOptions extends CommonRunOptions {
  handle: string;
  /** Number of new posts to discover and to return. */
  posts?: number;
  exhaustive?: boolean;
}

export interface TrendsRunOptions extends CommonRunOptions {
  category: string;
  maxReels?: number;
  maxHours?: number;
}

export interface CompletedRun {
  runId: string | null;
  outputPath: string | null;
  report: RunReport;
}

function finishRun(
  db: Database.Database,
  config: Config,
  report: RunReport,
  opts: CommonRunOptions,
): CompletedRun {
  const outputPath = opts.writeFile ? writeResultFile(report.result, config.output.data_dir) : null;
  const runId = opts.dryRun ? null : saveRun(db, report, outputPath);
  if (outputPath) {
    logger.info({ outputPath }, 'Result written');
  }
  return { runId, outputPath, report };
}

/**
 * Newest posts of a profile, excluding pinned ones.
 */
export async function runProfile(
  db: Database.Database,
  config: Config,
  opts: ProfileRunOptions,
): Promise<CompletedRun> {
  const entity: SourceEntity = { kind: 'handle', value: opts.handle };
  const posts = opts.posts ?? config.profile.default_posts;
  const factory = opts.collaborators ?? httpCollaborators;

  const report = await runDiscovery(
    {
      ...factory(entity, config, []),
      store: opts.dryRun ? new NullDedupStore() : new SqliteDedupStore(db),
    },
    {
      entity,
      strategy: { name: 'chronological', limit: posts },
      targetNewCount: posts,
      mode: opts.exhaustive ? 'exhaustive' : config.profile.mode,
      stagnationLimit: config.pagination.stagnation_limit,
      roundCap: config.pagination.round_cap,
      concurrency: config.pagination.concurrency,
      patterns: compilePatterns(config.normalize.boilerplate_patterns),
      signal: opts.signal,
    },
  );

  return finishRun(db, config, report, opts);
}

/**
 * Most engaging recent items for a category, across the category's hashtags.
 */
export async function runTrends(
  db: Database.Database,
  config: Config,
  opts: TrendsRunOptions,
): Promise<CompletedRun> {
  const presets = loadCategoryPresets(config.categories_file || undefined);
  const resolved = resolveCategory(presets, opts.category);
  if (resolved.fallback) {
    logger.warn({ category: resolved.category }, 'Unknown category, using generic hashtags');
  }

  const entity: SourceEntity = { kind: 'topic', value: resolved.category };
  const factory = opts.collaborators ?? httpCollaborators;

  const report = await runDiscovery(
    {
      ...factory(entity, config, resolved.hashtags),
      store: opts.dryRun ? new NullDedupStore() : new SqliteDedupStore(db),
    },
    {
      entity,
      strategy: {
        name: 'engagement',
        limit: opts.maxReels ?? config.trends.default_max_reels,
        maxAgeHours: opts.maxHours ?? config.trends.default_max_hours,
      },
      targetNewCount: config.trends.target_new,
      mode: config.trends.mode,
      stagnationLimit: config.pagination.stagnation_limit,
      roundCap: config.pagination.round_cap,
      concurrency: config.pagination.concurrency,
      patterns: compilePatterns(config.normalize.boilerplate_patterns),
      hashtags: resolved.hashtags,
      signal: opts.signal,
    },
  );

  return finishRun(db, config, report, opts);
}
