#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getScoutDir, resolvePath } from '../shared/utils.js';
import { listCategories, loadCategoryPresets, resolveCategory } from '../shared/categories.js';
import { errorMessage } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { countSeenByEntity, listSeenItems } from '../discovery/dedupStore.js';
import { entityKey } from '../discovery/types.js';
import { runProfile, runTrends, type CompletedRun } from '../engine/runner.js';
import { getRun, listRuns, readResultFile } from '../engine/output.js';
import { buildHandoff, toJsonLines } from '../engine/handoff.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('gridscout')
  .description('Incremental content discovery and ranking for profiles and topics')
  .version('0.1.0');

async function openDb(): Promise<{ db: Database.Database; config: Config; cleanup: () => void }> {
  const config = await loadConfig();
  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);
  return { db, config, cleanup: closeDb };
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Expected a positive number, got "${value}"`);
  }
  return n;
}

/**
 * Ctrl+C stops issuing rounds; the run still finishes and reports.
 */
function cancelOnSigint(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = (): void => {
    log('\nStopping after the current round...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  return { signal: controller.signal, dispose: () => process.off('SIGINT', onSigint) };
}

function printRun(run: CompletedRun): void {
  const { stats, result } = run.report;
  log(
    `✓ ${stats.state}: ${stats.rounds} rounds, ${stats.candidates} new candidates, ` +
      `${stats.resolved} resolved, ${stats.unresolved} unresolved, ${stats.filteredOut} filtered out`,
  );
  for (const [i, record] of result.records.entries()) {
    const score = record.metrics ? `score ${record.metrics.engagementScore}` : 'no metrics';
    log(`${String(i + 1).padStart(3)}. ${record.timestamp ?? 'unknown time'}  ${score.padEnd(14)} ${record.url}`);
  }
  if (result.records.length === 0) {
    log('No items survived filtering.');
  }
  if (run.outputPath) {
    log(`✓ Saved → ${run.outputPath}`);
  }
}

// === init ===
program
  .command('init')
  .description('Create config and database')
  .action(async () => {
    const configPath = path.join(getScoutDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const db = initDb(resolvePath(config.db.path));
    try {
      const { applied } = runMigrations(db);
      log(applied.length > 0 ? `✓ database created (${applied.length} migrations applied)` : '✓ database already up to date');
    } finally {
      closeDb();
    }
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database, category presets and collector settings')
  .action(async () => {
    const results: string[] = [];
    try {
      const config = await loadConfig();
      results.push('Config: ok');

      try {
        const { db, cleanup } = await openDb();
        try {
          const entities = countSeenByEntity(db);
          results.push(`DB: ok (${entities.length} entities tracked)`);
        } finally {
          cleanup();
        }
      } catch (err) {
        results.push(`DB: error (${errorMessage(err)})`);
      }

      try {
        const presets = loadCategoryPresets(config.categories_file || undefined);
        results.push(`Categories: ${listCategories(presets).length}`);
      } catch (err) {
        results.push(`Categories: error (${errorMessage(err)})`);
      }

      results.push(config.collector.base_url ? `Collector: ${config.collector.base_url}` : 'Collector: (base_url unconfigured)');
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
    }
    log(results.join(' | '));
  });

// === profile ===
program
  .command('profile <handle>')
  .description('Newest new posts of a profile, pinned posts excluded')
  .option('-p, --posts <n>', 'New posts to discover and return', parsePositiveInt)
  .option('--exhaustive', 'Keep paging until the profile stops yielding new posts', false)
  .option('--dry-run', 'Do not read or write the seen-item store', false)
  .option('--no-out', 'Do not write a result JSON file')
  .action(async (handle: string, opts: { posts?: number; exhaustive: boolean; dryRun: boolean; out: boolean }) => {
    const { db, config, cleanup } = await openDb();
    const cancel = cancelOnSigint();
    try {
      const run = await runProfile(db, config, {
        handle,
        posts: opts.posts,
        exhaustive: opts.exhaustive,
        dryRun: opts.dryRun,
        writeFile: opts.out,
        signal: cancel.signal,
      });
      printRun(run);
    } finally {
      cancel.dispose();
      cleanup();
    }
  });

// === trends ===
program
  .command('trends <category>')
  .description('Most engaging recent items across a category\'s hashtags')
  .option('-n, --max-reels <n>', 'Items to keep after ranking', parsePositiveInt)
  .option('-a, --max-hours <h>', 'Only keep items newer than this many hours', parsePositiveNumber)
  .option('--dry-run', 'Do not read or write the seen-item store', false)
  .option('--no-out', 'Do not write a result JSON file')
  .action(async (category: string, opts: { maxReels?: number; maxHours?: number; dryRun: boolean; out: boolean }) => {
    const { db, config, cleanup } = await openDb();
    const cancel = cancelOnSigint();
    try {
      const run = await runTrends(db, config, {
        category,
        maxReels: opts.maxReels,
        maxHours: opts.maxHours,
        dryRun: opts.dryRun,
        writeFile: opts.out,
        signal: cancel.signal,
      });
      printRun(run);
    } finally {
      cancel.dispose();
      cleanup();
    }
  });

// === seen ===
const seenCmd = program.command('seen').description('Inspect the seen-item store');

seenCmd
  .command('count')
  .description('Seen items per source entity')
  .action(async () => {
    const { db, cleanup } = await openDb();
    try {
      const rows = countSeenByEntity(db);
      if (rows.length === 0) {
        log('Nothing seen yet.');
      }
      for (const row of rows) {
        log(`${row.source_entity.padEnd(30)} ${String(row.count).padStart(6)}`);
      }
    } finally {
      cleanup();
    }
  });

seenCmd
  .command('list <kind> <value>')
  .description('Most recently seen items of a handle or topic')
  .option('-l, --limit <n>', 'Rows to show', parsePositiveInt, 50)
  .action(async (kind: string, value: string, opts: { limit: number }) => {
    if (kind !== 'handle' && kind !== 'topic') {
      log('kind must be "handle" or "topic"');
      process.exitCode = 1;
      return;
    }
    const { db, cleanup } = await openDb();
    try {
      for (const item of listSeenItems(db, entityKey({ kind, value }), { limit: opts.limit })) {
        log(`${item.first_seen_at}  ${(item.timestamp ?? '-').padEnd(25)}  ${item.item_id}`);
      }
    } finally {
      cleanup();
    }
  });

// === runs ===
const runsCmd = program.command('runs').description('Run history');

runsCmd
  .command('list')
  .description('Recent runs')
  .option('-l, --limit <n>', 'Rows to show', parsePositiveInt, 20)
  .action(async (opts: { limit: number }) => {
    const { db, cleanup } = await openDb();
    try {
      for (const run of listRuns(db, { limit: opts.limit })) {
        log(`${run.id}  ${run.generatedAt}  ${run.sourceEntity.padEnd(24)} ${run.finalState.padEnd(20)} ${run.recordCount}`);
      }
    } finally {
      cleanup();
    }
  });

runsCmd
  .command('show <id>')
  .description('Print a stored result set as JSON')
  .action(async (id: string) => {
    const { db, cleanup } = await openDb();
    try {
      const run = getRun(db, id);
      if (!run) {
        log(`Run not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      log(JSON.stringify(run.result, null, 2));
    } finally {
      cleanup();
    }
  });

// === categories ===
program
  .command('categories')
  .description('List category presets used by trends runs')
  .action(async () => {
    const config = await loadConfig();
    const presets = loadCategoryPresets(config.categories_file || undefined);
    for (const name of listCategories(presets)) {
      log(`${name.padEnd(18)} ${resolveCategory(presets, name).hashtags.map((t) => `#${t}`).join(' ')}`);
    }
  });

// === handoff ===
program
  .command('handoff <file>')
  .description('Print a result file as JSON lines sized for a downstream classifier')
  .action(async (file: string) => {
    const config = await loadConfig();
    const result = readResultFile(file);
    log(toJsonLines(buildHandoff(result, config.handoff)));
  });

// === server ===
program
  .command('server')
  .description('Start the HTTP API and the scheduler')
  .option('-p, --port <port>', 'Port to listen on', parsePositiveInt)
  .action(async (opts: { port?: number }) => {
    await startServer({ port: opts.port });
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`✗ ${errorMessage(err)}`);
  process.exitCode = 1;
});
