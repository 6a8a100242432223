import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runMigrations, type MigrationReport } from './migrate.js';

const PRAGMAS = ['journal_mode = WAL', 'foreign_keys = ON', 'busy_timeout = 5000'];

/**
 * Open the state database holding the run log and the failure ledger. The caller owns
 * the connection and closes it.
 */
export function openDatabase(dbPath: string): Database.Database {
  const file = dbPath === ':memory:' ? dbPath : resolvePath(dbPath);
  if (file !== ':memory:') fs.mkdirSync(path.dirname(file), { recursive: true });

  let db: Database.Database;
  try {
    db = new Database(file);
  } catch (err) {
    throw new DbError(`Cannot open state database at ${file}`, { path: file, cause: errorMessage(err) });
  }
  for (const pragma of PRAGMAS) db.pragma(pragma);

  logger.debug({ path: file }, 'State database opened');
  return db;
}

/**
 * Open and migrate the database for the length of `fn`.
 */
export async function withDatabase<T>(
  dbPath: string,
  fn: (db: Database.Database, migrations: MigrationReport) => T | Promise<T>,
): Promise<T> {
  const db = openDatabase(dbPath);
  try {
    return await fn(db, runMigrations(db));
  } finally {
    db.close();
  }
}
