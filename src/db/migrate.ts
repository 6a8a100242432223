import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

interface MigrationFile {
  name: string;
  sql: string;
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/** `NNN_name.sql` files in lexical order. */
function readMigrations(dir: string): MigrationFile[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith('.sql'))
    .sort()
    .map((name) => ({ name, sql: fs.readFileSync(path.join(dir, name), 'utf-8') }));
}

/**
 * Apply every migration not yet recorded in `_migrations`, each in its own
 * transaction. A failing file leaves no trace and stops the run.
 */
export function runMigrations(db: Database.Database, dir = defaultMigrationsDir()): MigrationReport {
  db.exec(`CREATE TABLE IF NOT EXISTS _migrations (
    name       TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`);

  const done = new Set(db.prepare('SELECT name FROM _migrations').pluck().all() as string[]);
  const apply = db.transaction((migration: MigrationFile) => {
    db.exec(migration.sql);
    db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
  });

  const report: MigrationReport = { applied: [], skipped: [] };
  for (const migration of readMigrations(dir)) {
    if (done.has(migration.name)) {
      report.skipped.push(migration.name);
      continue;
    }
    try {
      apply(migration);
    } catch (err) {
      throw new DbError(`Migration failed: ${migration.name}`, { migration: migration.name, cause: errorMessage(err) });
    }
    report.applied.push(migration.name);
    logger.info({ migration: migration.name }, 'Migration applied');
  }
  return report;
}
