import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function listMigrationFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Apply every pending .sql file in name order, each inside its own transaction.
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string = getMigrationsDir(),
): MigrationResult {
  ensureMigrationsTable(db);

  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  const alreadyApplied = new Set(rows.map((r) => r.name));
  const pending = listMigrationFiles(migrationsDir).filter((f) => !alreadyApplied.has(f));

  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');
  const applied: string[] = [];

  for (const migration of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, migration), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(migration);
    });

    try {
      apply();
      applied.push(migration);
      logger.info({ migration }, 'Migration applied');
    } catch (err) {
      throw new DbError(`Migration failed: ${migration}`, {
        migration,
        cause: errorMessage(err),
      });
    }
  }

  return { applied, skipped: [...alreadyApplied] };
}
