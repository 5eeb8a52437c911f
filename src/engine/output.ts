import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import type { RunReport, RunStats } from './run.js';
import { RankedResultSetSchema, type RankedResultSet } from './result.js';
import { entityKey, normalizeEntityValue } from '../discovery/types.js';
import { DbError, ParseError, errorMessage } from '../shared/errors.js';
import { fileStamp, generateId, resolvePath } from '../shared/utils.js';

export interface RunRow {
  id: string;
  source_entity: string;
  strategy: string;
  final_state: string;
  record_count: number;
  generated_at: string;
  result_json: string;
  stats_json: string;
  output_path: string | null;
}

export interface RunSummary {
  id: string;
  sourceEntity: string;
  strategy: string;
  finalState: string;
  recordCount: number;
  generatedAt: string;
  outputPath: string | null;
}

export interface StoredRun extends RunSummary {
  result: RankedResultSet;
  stats: RunStats;
}

/**
 * <dataDir>/<entity>/<entity>_<stamp>.json for profiles,
 * <dataDir>/<entity>/trends_<entity>_<stamp>.json for topics.
 */
export function resultFilePath(result: RankedResultSet, dataDir: string): string {
  const value = normalizeEntityValue(result.sourceEntity.value).replace(/[^\p{L}\p{N}_.-]/gu, '_');
  const stamp = fileStamp(new Date(result.generatedAt));
  const name = result.sourceEntity.kind === 'topic' ? `trends_${value}_${stamp}.json` : `${value}_${stamp}.json`;
  return path.join(resolvePath(dataDir), value, name);
}

export function writeResultFile(result: RankedResultSet, dataDir: string): string {
  const outPath = resultFilePath(result, dataDir);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, JSON.stringify(result, null, 2), 'utf-8');
  return outPath;
}

export function parseResultSet(raw: unknown): RankedResultSet {
  const parsed = RankedResultSetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError('Not a valid result set', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export function readResultFile(file: string): RankedResultSet {
  const resolved = resolvePath(file);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new ParseError(`Cannot read result file ${resolved}: ${errorMessage(err)}`);
  }
  return parseResultSet(raw);
}

export function saveRun(db: Database.Database, report: RunReport, outputPath: string | null = null): string {
  const id = generateId();
  try {
    db.prepare(
      `INSERT INTO runs
       (id, source_entity, strategy, final_state, record_count, generated_at, result_json, stats_json, output_path)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      id,
      entityKey(report.result.sourceEntity),
      report.result.strategy,
      report.stats.state,
      report.result.records.length,
      report.result.generatedAt,
      JSON.stringify(report.result),
      JSON.stringify(report.stats),
      outputPath,
    );
  } catch (err) {
    throw new DbError(`Failed to save run: ${errorMessage(err)}`);
  }
  return id;
}

function toSummary(row: RunRow): RunSummary {
  return {
    id: row.id,
    sourceEntity: row.source_entity,
    strategy: row.strategy,
    finalState: row.final_state,
    recordCount: row.record_count,
    generatedAt: row.generated_at,
    outputPath: row.output_path,
  };
}

export function listRuns(
  db: Database.Database,
  opts: { sourceEntity?: string; limit?: number } = {},
): RunSummary[] {
  const limit = opts.limit ?? 20;
  const rows = opts.sourceEntity
    ? (db
        .prepare('SELECT * FROM runs WHERE source_entity = ? ORDER BY generated_at DESC LIMIT ?')
        .all(opts.sourceEntity, limit) as RunRow[])
    : (db.prepare('SELECT * FROM runs ORDER BY generated_at DESC LIMIT ?').all(limit) as RunRow[]);
  return rows.map(toSummary);
}

export function getRun(db: Database.Database, id: string): StoredRun | undefined {
  const row = db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as RunRow | undefined;
  if (!row) return undefined;
  return {
    ...toSummary(row),
    result: parseResultSet(JSON.parse(row.result_json)),
    stats: JSON.parse(row.stats_json) as RunStats,
  };
}
