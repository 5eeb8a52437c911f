import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runMigrations } from '../../db/migrate.js';
import { countSeenByEntity } from '../../discovery/dedupStore.js';
import type { SourceEntity } from '../../discovery/types.js';
import { generateDefaultConfig, type Config } from '../../shared/config.js';
import { listRuns } from '../output.js';
import { runProfile, runTrends, type CollaboratorFactory } from '../runner.js';
import { ScriptedCollector, TableFetcher, raw } from './fakes.js';

const P1 = 'https://example.test/p/1/';
const P2 = 'https://example.test/p/2/';
const P3 = 'https://example.test/reel/3/';

const TABLE = {
  [P1]: raw({ timestampText: '2025-05-01T12:00:00Z', likesText: '10' }),
  [P2]: raw({ timestampText: null }),
  [P3]: raw({ timestampText: '2025-05-02T12:00:00Z', likesText: '50' }),
};

let db: Database.Database;
let dataDir: string;
let config: Config;
let calls: Array<{ entity: SourceEntity; hashtags: string[] }>;

const fakeCollaborators: CollaboratorFactory = (entity, _config, hashtags) => {
  calls.push({ entity, hashtags });
  return {
    collector: new ScriptedCollector([[P1, P2], [P3]]),
    fetcher: new TableFetcher(TABLE),
  };
};

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gridscout-runner-'));
  const defaults = generateDefaultConfig();
  config = {
    ...defaults,
    output: { data_dir: dataDir },
    pagination: { ...defaults.pagination, stagnation_limit: 2 },
  };
  calls = [];
});

afterEach(() => {
  db.close();
  fs.rmSync(dataDir, { recursive: true, force: true });
});

describe('runProfile', () => {
  it('stops at the target and drops pinned posts', async () => {
    const run = await runProfile(db, config, { handle: '@Corner_Cafe', posts: 2, collaborators: fakeCollaborators });

    expect(run.report.stats.state).toBe('STOPPING_TARGET_MET');
    expect(run.report.result.records.map((r) => r.id)).toEqual([P1]);
    expect(run.report.result.params).toEqual({ limit: 2, targetNewCount: 2 });
    expect(run.outputPath).toBeNull();
    expect(typeof run.runId).toBe('string');
    expect(listRuns(db).map((r) => r.sourceEntity)).toEqual(['handle:corner_cafe']);
    expect(countSeenByEntity(db)).toEqual([{ source_entity: 'handle:corner_cafe', count: 2 }]);
  });

  it('keeps paging in exhaustive mode', async () => {
    const run = await runProfile(db, config, {
      handle: 'corner_cafe',
      posts: 2,
      exhaustive: true,
      collaborators: fakeCollaborators,
    });

    expect(run.report.stats.state).toBe('STOPPING_STAGNANT');
    expect(run.report.result.records.map((r) => r.id)).toEqual([P3, P1]);
  });

  it('leaves no trace on a dry run', async () => {
    const run = await runProfile(db, config, {
      handle: 'corner_cafe',
      posts: 2,
      dryRun: true,
      collaborators: fakeCollaborators,
    });

    expect(run.runId).toBeNull();
    expect(run.report.result.records).toHaveLength(1);
    expect(countSeenByEntity(db)).toEqual([]);
    expect(listRuns(db)).toEqual([]);
  });

  it('writes the result file when asked', async () => {
    const run = await runProfile(db, config, {
      handle: 'corner_cafe',
      posts: 2,
      writeFile: true,
      collaborators: fakeCollaborators,
    });

    expect(run.outputPath?.startsWith(path.join(dataDir, 'corner_cafe', 'corner_cafe_'))).toBe(true);
    expect(fs.existsSync(run.outputPath ?? '')).toBe(true);
  });
});

describe('runTrends', () => {
  it('collects across the category hashtags', async () => {
    const run = await runTrends(db, config, {
      category: 'Restaurant',
      maxHours: 1_000_000,
      collaborators: fakeCollaborators,
    });

    expect(calls).toEqual([
      {
        entity: { kind: 'topic', value: 'restaurant' },
        hashtags: ['restaurant', 'foodie', 'foodreels', 'streetfood', 'dinnerideas', 'lunchspot'],
      },
    ]);
    expect(run.report.result.strategy).toBe('engagement');
    expect(run.report.result.records.map((r) => r.id)).toEqual([P3, P1]);
    expect(run.report.result.params.maxAgeHours).toBe(1_000_000);
    expect(run.report.result.params.targetNewCount).toBe(200);
  });

  it('falls back to generic hashtags for unknown categories', async () => {
    await runTrends(db, config, { category: 'aquarium', collaborators: fakeCollaborators });
    expect(calls[0]?.hashtags).toEqual(['trending', 'viral', 'explorepage', 'reels']);
  });

  it('honours max reels', async () => {
    const run = await runTrends(db, config, {
      category: 'restaurant',
      maxReels: 1,
      maxHours: 1_000_000,
      collaborators: fakeCollaborators,
    });
    expect(run.report.result.records.map((r) => r.id)).toEqual([P3]);
  });
});
