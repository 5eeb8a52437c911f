import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runMigrations } from '../../db/migrate.js';
import { createApp, errorCodeToHttpStatus } from '../server.js';
import { generateDefaultConfig, type Config } from '../../shared/config.js';
import type { CollaboratorFactory } from '../../engine/runner.js';
import { CollectionError } from '../../shared/errors.js';
import { ScriptedCollector, TableFetcher, raw } from '../../engine/__tests__/fakes.js';

const P1 = 'https://example.test/p/1/';

const collaborators: CollaboratorFactory = () => ({
  collector: new ScriptedCollector([[P1]]),
  fetcher: new TableFetcher({ [P1]: raw({ timestampText: '2025-05-01T12:00:00Z' }) }),
});

let db: Database.Database;
let dataDir: string;
let config: Config;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gridscout-api-'));
  config = { ...generateDefaultConfig(), output: { data_dir: dataDir } };
});

afterEach(() => {
  db.close();
  fs.rmSync(dataDir, { recursive: true, force: true });
});

function post(pathname: string, body: unknown): Request {
  return new Request(`http://localhost${pathname}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('system routes', () => {
  it('reports health', async () => {
    const res = await createApp({ db, config }).request('/api/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, collector_configured: false, scheduled_jobs: 0 });
  });

  it('lists categories with hashtags', async () => {
    const res = await createApp({ db, config }).request('/api/categories');
    const body = await res.json();
    expect(body[0]).toEqual({ name: 'bakery', hashtags: expect.any(Array) });
  });

  it('returns 404 for unknown paths', async () => {
    const res = await createApp({ db, config }).request('/api/nope');
    expect(res.status).toBe(404);
  });
});

describe('run routes', () => {
  it('runs a profile and stores it', async () => {
    const app = createApp({ db, config, collaborators });
    const res = await app.request(post('/api/runs/profile', { handle: 'corner_cafe', posts: 1 }));

    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body.stats.state).toBe('STOPPING_TARGET_MET');
    expect(body.result.records[0].id).toBe(P1);
    expect(body.output_path).toBeNull();

    const list = await (await app.request('/api/runs?entity=handle:corner_cafe')).json();
    expect(list).toHaveLength(1);
    expect(list[0].id).toBe(body.run_id);

    const stored = await app.request(`/api/runs/${body.run_id}`);
    expect(stored.status).toBe(200);
    expect((await stored.json()).recordCount).toBe(1);
  });

  it('rejects an invalid body', async () => {
    const res = await createApp({ db, config, collaborators }).request(post('/api/runs/profile', { posts: 0 }));
    expect(res.status).toBe(400);
  });

  it('runs trends without touching the store on a dry run', async () => {
    const app = createApp({ db, config, collaborators });
    const res = await app.request(post('/api/runs/trends', { category: 'cafe', max_hours: 1_000_000, dry_run: true }));

    expect(res.status).toBe(201);
    const body = await res.json();
    expect(body.run_id).toBeNull();
    expect(body.result.sourceEntity).toEqual({ kind: 'topic', value: 'cafe' });
    expect(await (await app.request('/api/seen')).json()).toEqual([]);
  });

  it('returns 404 for an unknown run', async () => {
    const res = await createApp({ db, config }).request('/api/runs/missing');
    expect(res.status).toBe(404);
  });

  it('maps domain errors to HTTP statuses', async () => {
    const failing: CollaboratorFactory = () => {
      throw new CollectionError('listing unavailable');
    };
    const res = await createApp({ db, config, collaborators: failing }).request(
      post('/api/runs/profile', { handle: 'corner_cafe' }),
    );
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'listing unavailable', code: 'COLLECTION_ERROR' });
  });

  it('surfaces a missing collector base url as a bad request', async () => {
    const res = await createApp({ db, config }).request(post('/api/runs/profile', { handle: 'corner_cafe' }));
    expect(res.status).toBe(400);
  });
});

describe('seen routes', () => {
  it('lists seen items of an entity', async () => {
    const app = createApp({ db, config, collaborators });
    await app.request(post('/api/runs/profile', { handle: 'Corner_Cafe', posts: 1 }));

    const res = await app.request('/api/seen/handle/corner_cafe');
    const body = await res.json();
    expect(body.source_entity).toBe('handle:corner_cafe');
    expect(body.items.map((i: { item_id: string }) => i.item_id)).toEqual([P1]);
  });

  it('rejects unknown entity kinds', async () => {
    const res = await createApp({ db, config }).request('/api/seen/place/corner_cafe');
    expect(res.status).toBe(400);
  });
});

describe('errorCodeToHttpStatus', () => {
  it('maps codes to statuses', () => {
    expect(errorCodeToHttpStatus('CONFIG_ERROR')).toBe(400);
    expect(errorCodeToHttpStatus('HTTP_ERROR')).toBe(502);
    expect(errorCodeToHttpStatus('STORE_ERROR')).toBe(500);
  });
});
