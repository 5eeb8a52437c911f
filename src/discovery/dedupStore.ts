import type Database from 'better-sqlite3';
import { nowISO } from '../shared/utils.js';
import { StoreError, errorMessage } from '../shared/errors.js';

/**
 * Persisted set of item ids already seen per source entity.
 *
 * Entries are append-only and unique on (entity, item). There is no
 * cross-process locking: two concurrent runs on the same entity may both
 * admit an item, but neither loses an entry.
 */
export interface DedupStore {
  load(sourceEntity: string): Set<string>;
  /** Returns true when a new entry was written. */
  insertIfAbsent(sourceEntity: string, itemId: string, timestamp: string | null): boolean;
}

export interface SeenItem {
  source_entity: string;
  item_id: string;
  timestamp: string | null;
  first_seen_at: string;
}

export class SqliteDedupStore implements DedupStore {
  constructor(private readonly db: Database.Database) {}

  load(sourceEntity: string): Set<string> {
    try {
      const rows = this.db
        .prepare('SELECT item_id FROM seen_items WHERE source_entity = ?')
        .all(sourceEntity) as Array<{ item_id: string }>;
      return new Set(rows.map((r) => r.item_id));
    } catch (err) {
      throw new StoreError(`Failed to load seen items: ${errorMessage(err)}`, { sourceEntity });
    }
  }

  insertIfAbsent(sourceEntity: string, itemId: string, timestamp: string | null): boolean {
    try {
      const result = this.db
        .prepare(
          `INSERT OR IGNORE INTO seen_items (source_entity, item_id, timestamp, first_seen_at)
           VALUES (?, ?, ?, ?)`,
        )
        .run(sourceEntity, itemId, timestamp, nowISO());
      return result.changes > 0;
    } catch (err) {
      throw new StoreError(`Failed to record seen item: ${errorMessage(err)}`, {
        sourceEntity,
        itemId,
      });
    }
  }
}

/**
 * Dry-run store: remembers nothing and never writes.
 */
export class NullDedupStore implements DedupStore {
  load(): Set<string> {
    return new Set();
  }

  insertIfAbsent(): boolean {
    return false;
  }
}

export function listSeenItems(
  db: Database.Database,
  sourceEntity: string,
  opts: { limit?: number } = {},
): SeenItem[] {
  const limit = opts.limit ?? 100;
  return db
    .prepare(
      `SELECT * FROM seen_items WHERE source_entity = ?
       ORDER BY first_seen_at DESC, item_id ASC LIMIT ?`,
    )
    .all(sourceEntity, limit) as SeenItem[];
}

export function countSeenByEntity(
  db: Database.Database,
): Array<{ source_entity: string; count: number }> {
  return db
    .prepare(
      `SELECT source_entity, COUNT(*) as count FROM seen_items
       GROUP BY source_entity ORDER BY source_entity`,
    )
    .all() as Array<{ source_entity: string; count: number }>;
}
