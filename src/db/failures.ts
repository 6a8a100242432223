import type Database from 'better-sqlite3';
import type { FailureEntry, FailureLedger, StoredFailure } from '../store/persist.js';
import type { ArchiveRecord } from '../store/records.js';
import type { SinkName } from '../shared/errors.js';
import { DbError } from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';

interface FailureRow {
  id: number;
  sink: SinkName;
  url: string;
  title: string;
  source: string;
  error: string;
  record_json: string;
  created_at: string;
  resolved_at: string | null;
}

export interface FailureSummary {
  id: number;
  sink: SinkName;
  url: string;
  title: string;
  source: string;
  error: string;
  created_at: string;
  resolved_at: string | null;
}

function toStored(row: FailureRow): StoredFailure {
  return {
    id: row.id,
    sink: row.sink,
    url: row.url,
    title: row.title,
    source: row.source,
    error: row.error,
    createdAt: row.created_at,
    record: JSON.parse(row.record_json) as ArchiveRecord,
  };
}

export function insertFailure(db: Database.Database, entry: FailureEntry): number {
  try {
    const info = db
      .prepare(
        `INSERT INTO persistence_failures (sink, url, title, source, error, record_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(entry.sink, entry.url, entry.title, entry.source, entry.error, JSON.stringify(entry.record), nowISO());
    return Number(info.lastInsertRowid);
  } catch (err) {
    throw new DbError(`Failed to record persistence failure: ${err instanceof Error ? err.message : String(err)}`, {
      url: entry.url,
      sink: entry.sink,
    });
  }
}

export function listFailures(
  db: Database.Database,
  opts: { includeResolved?: boolean; limit?: number } = {},
): FailureSummary[] {
  const where = opts.includeResolved ? '' : 'WHERE resolved_at IS NULL';
  return db
    .prepare(
      `SELECT id, sink, url, title, source, error, created_at, resolved_at
       FROM persistence_failures ${where} ORDER BY id DESC LIMIT ?`,
    )
    .all(opts.limit ?? 100) as FailureSummary[];
}

export function getPendingFailures(db: Database.Database, ids?: number[]): StoredFailure[] {
  if (ids && ids.length === 0) return [];
  const filter = ids ? `AND id IN (${ids.map(() => '?').join(', ')})` : '';
  const rows = db
    .prepare(`SELECT * FROM persistence_failures WHERE resolved_at IS NULL ${filter} ORDER BY id ASC`)
    .all(...(ids ?? [])) as FailureRow[];
  return rows.map(toStored);
}

export function markFailureResolved(db: Database.Database, id: number): boolean {
  const info = db
    .prepare('UPDATE persistence_failures SET resolved_at = ? WHERE id = ? AND resolved_at IS NULL')
    .run(nowISO(), id);
  return info.changes > 0;
}

export function resolveFailuresFor(db: Database.Database, url: string, sink: SinkName): number {
  const info = db
    .prepare('UPDATE persistence_failures SET resolved_at = ? WHERE url = ? AND sink = ? AND resolved_at IS NULL')
    .run(nowISO(), url, sink);
  return info.changes;
}

/**
 * FailureLedger over the `persistence_failures` table.
 */
export class SqliteFailureLedger implements FailureLedger {
  constructor(private readonly db: Database.Database) {}

  record(entry: FailureEntry): void {
    insertFailure(this.db, entry);
  }

  pending(ids?: number[]): StoredFailure[] {
    return getPendingFailures(this.db, ids);
  }

  markResolved(id: number): void {
    markFailureResolved(this.db, id);
  }

  resolveFor(url: string, sink: SinkName): number {
    return resolveFailuresFor(this.db, url, sink);
  }
}
