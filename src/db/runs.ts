import type Database from 'better-sqlite3';
import type { CycleStats, RunStatus, SourceStats, StatsSink } from '../pipeline/stats.js';
import type { RetentionResult } from '../retention/sweeper.js';
import { DbError } from '../shared/errors.js';

// ================================================================
// Row shapes
// ================================================================

export interface CycleRunRow {
  id: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  discovered: number;
  processed: number;
  failed: number;
  skipped: number;
  sources_json: string;
  error: string | null;
}

export interface RetentionRunRow {
  id: string;
  started_at: string;
  retention_hours: number;
  cutoff: string;
  status: RunStatus;
  deleted_count: number;
  archive_deleted: number;
  count_before: number | null;
  count_after: number | null;
  duration_seconds: number;
  error: string | null;
}

export interface CycleRunView extends Omit<CycleRunRow, 'sources_json'> {
  sources: SourceStats[];
}

function toView(row: CycleRunRow): CycleRunView {
  const { sources_json, ...rest } = row;
  return { ...rest, sources: JSON.parse(sources_json) as SourceStats[] };
}

// ================================================================
// Cycle runs
// ================================================================

export function insertCycleRun(db: Database.Database, stats: CycleStats): void {
  try {
    db.prepare(
      `INSERT OR REPLACE INTO cycle_runs
         (id, started_at, finished_at, status, discovered, processed, failed, skipped, sources_json, error)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      stats.id,
      stats.startedAt.toISOString(),
      stats.finishedAt?.toISOString() ?? null,
      stats.status,
      stats.discovered,
      stats.processed,
      stats.failed,
      stats.skipped,
      JSON.stringify(stats.sources),
      stats.error ?? null,
    );
  } catch (err) {
    throw new DbError(`Failed to record cycle run: ${err instanceof Error ? err.message : String(err)}`, {
      id: stats.id,
    });
  }
}

export function listCycleRuns(db: Database.Database, limit = 20): CycleRunView[] {
  const rows = db
    .prepare('SELECT * FROM cycle_runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
    .all(limit) as CycleRunRow[];
  return rows.map(toView);
}

export function getLatestCycleRun(db: Database.Database): CycleRunView | undefined {
  return listCycleRuns(db, 1)[0];
}

// ================================================================
// Retention runs
// ================================================================

export function insertRetentionRun(db: Database.Database, result: RetentionResult): void {
  try {
    db.prepare(
      `INSERT OR REPLACE INTO retention_runs
         (id, started_at, retention_hours, cutoff, status, deleted_count, archive_deleted,
          count_before, count_after, duration_seconds, error)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      result.id,
      result.startedAt.toISOString(),
      result.retentionHours,
      result.cutoff.toISOString(),
      result.status,
      result.deletedCount,
      result.archiveDeleted,
      result.countBefore,
      result.countAfter,
      result.durationSeconds,
      result.error ?? null,
    );
  } catch (err) {
    throw new DbError(`Failed to record retention run: ${err instanceof Error ? err.message : String(err)}`, {
      id: result.id,
    });
  }
}

export function listRetentionRuns(db: Database.Database, limit = 20): RetentionRunRow[] {
  return db
    .prepare('SELECT * FROM retention_runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
    .all(limit) as RetentionRunRow[];
}

export function getLatestRetentionRun(db: Database.Database): RetentionRunRow | undefined {
  return listRetentionRuns(db, 1)[0];
}

/**
 * StatsSink over the run tables.
 */
export class SqliteRunLog implements StatsSink {
  constructor(private readonly db: Database.Database) {}

  recordCycle(stats: CycleStats): void {
    insertCycleRun(this.db, stats);
  }

  recordRetention(result: RetentionResult): void {
    insertRetentionRun(this.db, result);
  }
}
