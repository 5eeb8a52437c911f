import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runMigrations } from '../migrate.js';
import { DbError } from '../../shared/errors.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates all tables from 001_init.sql', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;
    expect(tables.map((t) => t.name)).toEqual(['_migrations', 'runs', 'seen_items']);
  });

  it('is idempotent (second run applies nothing)', () => {
    runMigrations(db);
    const second = runMigrations(db);
    expect(second.applied).toEqual([]);
    expect(second.skipped).toContain('001_init.sql');
  });

  it('creates indexes', () => {
    runMigrations(db);
    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%' ORDER BY name")
      .all() as Array<{ name: string }>;
    expect(indexes.map((i) => i.name)).toEqual(['idx_runs_entity', 'idx_seen_first_seen']);
  });

  it('rolls back a failing migration and reports it', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gridscout-migrations-'));
    try {
      fs.writeFileSync(path.join(dir, '001_ok.sql'), 'CREATE TABLE a (id INTEGER);');
      fs.writeFileSync(path.join(dir, '002_bad.sql'), 'CREATE TABLE b (id INTEGER); NOT SQL;');

      expect(() => runMigrations(db, dir)).toThrow(DbError);

      const names = (db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>).map(
        (r) => r.name,
      );
      expect(names).toEqual(['001_ok.sql']);
      const b = db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name = 'b'").get();
      expect(b).toBeUndefined();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('throws DbError when the directory is missing', () => {
    expect(() => runMigrations(db, path.join(os.tmpdir(), 'gridscout-does-not-exist'))).toThrow(DbError);
  });
});
