import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { SqliteDedupStore, type DedupStore } from '../../discovery/dedupStore.js';
import { runDiscovery, type RunOptions } from '../run.js';
import { RecordingSession, ScriptedCollector, TableFetcher, raw } from './fakes.js';

const P1 = 'https://example.test/p/1/';
const P2 = 'https://example.test/p/2/';
const P3 = 'https://example.test/p/3/';
const P4 = 'https://example.test/reel/4/';

const PROFILE_TABLE = {
  [P1]: raw({ timestampText: '2025-05-01T12:00:00Z', text: 'first #Brunch' }),
  [P2]: raw({ timestampText: null, text: 'pinned welcome post' }),
  [P4]: raw({ timestampText: '2025-05-02T08:00:00Z', text: 'new reel' }),
};

const profileOptions: RunOptions = {
  entity: { kind: 'handle', value: 'corner_cafe' },
  strategy: { name: 'chronological', limit: 10 },
  targetNewCount: 10,
  mode: 'bounded',
  stagnationLimit: 2,
};

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
});

afterEach(() => {
  db.close();
});

describe('runDiscovery', () => {
  it('pages, resolves, filters pinned items and ranks newest first', async () => {
    const session = new RecordingSession();
    const report = await runDiscovery(
      {
        collector: new ScriptedCollector([[P1, P2, P3], [P4]]),
        fetcher: new TableFetcher(PROFILE_TABLE),
        store: new SqliteDedupStore(db),
        session,
      },
      profileOptions,
    );

    expect(report.result.records.map((r) => r.id)).toEqual([P4, P1]);
    expect(report.result.records[1]?.hashtags).toEqual(['#brunch']);
    expect(report.stats).toMatchObject({
      state: 'STOPPING_STAGNANT',
      rounds: 4,
      candidates: 4,
      resolved: 3,
      unresolved: 1,
      filteredOut: 1,
      persisted: 3,
      storeFailures: 0,
    });
    expect(report.unresolved).toEqual([{ id: P3, url: P3, error: 'Item page failed: not found' }]);
    expect(session.events).toEqual(['open', 'close']);
  });

  it('returns nothing new on an immediate re-run', async () => {
    const collaborators = () => ({
      collector: new ScriptedCollector([[P1, P2], [P4]]),
      fetcher: new TableFetcher(PROFILE_TABLE),
      store: new SqliteDedupStore(db),
    });

    await runDiscovery(collaborators(), profileOptions);
    const second = await runDiscovery(collaborators(), profileOptions);

    expect(second.result.records).toEqual([]);
    expect(second.stats.candidates).toBe(0);
    expect(second.stats.persisted).toBe(0);
    expect(second.stats.state).toBe('STOPPING_STAGNANT');
  });

  it('retries unresolved candidates on the next run', async () => {
    const collector = () => new ScriptedCollector([[P1, P3]]);

    await runDiscovery(
      { collector: collector(), fetcher: new TableFetcher(PROFILE_TABLE), store: new SqliteDedupStore(db) },
      profileOptions,
    );
    const fetcher = new TableFetcher(PROFILE_TABLE);
    const second = await runDiscovery(
      { collector: collector(), fetcher, store: new SqliteDedupStore(db) },
      profileOptions,
    );

    expect(fetcher.requested).toEqual([P3]);
    expect(second.stats.unresolved).toBe(1);
  });

  it('carries on when the store cannot be read or written', async () => {
    const broken: DedupStore = {
      load: () => {
        throw new Error('disk unavailable');
      },
      insertIfAbsent: () => {
        throw new Error('disk unavailable');
      },
    };

    const report = await runDiscovery(
      { collector: new ScriptedCollector([[P1]]), fetcher: new TableFetcher(PROFILE_TABLE), store: broken },
      profileOptions,
    );

    expect(report.result.records.map((r) => r.id)).toEqual([P1]);
    expect(report.stats.storeFailures).toBe(2);
    expect(report.stats.persisted).toBe(0);
  });

  it('ranks recent items by engagement and records the parameters', async () => {
    const table = {
      [P1]: raw({ timestampText: '2025-05-04T00:00:00Z', likesText: '100', commentsText: '10' }),
      [P2]: raw({ timestampText: '2025-05-03T00:00:00Z', likesText: '80', commentsText: '20' }),
      [P3]: raw({ timestampText: '2025-04-20T00:00:00Z', likesText: '9k', commentsText: '500' }),
      [P4]: raw({ timestampText: '2025-05-04T06:00:00Z' }),
    };

    const report = await runDiscovery(
      { collector: new ScriptedCollector([[P1, P2, P3, P4]]), fetcher: new TableFetcher(table), store: new SqliteDedupStore(db) },
      {
        entity: { kind: 'topic', value: 'cafe' },
        strategy: { name: 'engagement', limit: 5, maxAgeHours: 72 },
        targetNewCount: 200,
        mode: 'exhaustive',
        stagnationLimit: 1,
        hashtags: ['coffee'],
        now: () => new Date('2025-05-04T12:00:00Z'),
      },
    );

    expect(report.result.records.map((r) => r.id)).toEqual([P2, P1, P4]);
    expect(report.result.generatedAt).toBe('2025-05-04T12:00:00.000Z');
    expect(report.result.strategy).toBe('engagement');
    expect(report.result.params).toEqual({ limit: 5, targetNewCount: 200, maxAgeHours: 72, hashtags: ['coffee'] });
    expect(report.stats.filteredOut).toBe(1);
    expect(report.stats.state).toBe('STOPPING_STAGNANT');
  });

  it('keeps the limit even when more items survive', async () => {
    const report = await runDiscovery(
      { collector: new ScriptedCollector([[P1, P4]]), fetcher: new TableFetcher(PROFILE_TABLE), store: new SqliteDedupStore(db) },
      { ...profileOptions, strategy: { name: 'chronological', limit: 1 } },
    );
    expect(report.result.records.map((r) => r.id)).toEqual([P4]);
  });
});
