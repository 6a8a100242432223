import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runMigrations } from '../migrate.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates the run and failure tables', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(tables.map((t) => t.name)).toEqual([
      '_migrations',
      'cycle_runs',
      'persistence_failures',
      'retention_runs',
      'sqlite_sequence',
    ]);
  });

  it('is idempotent (second run applies nothing)', () => {
    const first = runMigrations(db);
    expect(first.applied.length).toBeGreaterThan(0);

    const second = runMigrations(db);
    expect(second.applied.length).toBe(0);
    expect(second.skipped.length).toBeGreaterThan(0);
  });

  it('records applied migrations in _migrations table', () => {
    runMigrations(db);

    const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
    expect(rows.length).toBeGreaterThan(0);
    expect(rows.some((r) => r.name === '001_init.sql')).toBe(true);
  });

  it('creates correct indexes', () => {
    runMigrations(db);

    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%'")
      .all() as Array<{ name: string }>;

    expect(indexes.map((i) => i.name).sort()).toEqual([
      'idx_cycle_runs_started',
      'idx_failures_pending',
      'idx_failures_url',
      'idx_retention_runs_started',
    ]);
  });

  it('stops at a failing file and records only what applied', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-migrations-'));
    try {
      fs.writeFileSync(path.join(dir, '001_ok.sql'), 'CREATE TABLE notes (body TEXT);');
      fs.writeFileSync(path.join(dir, '002_bad.sql'), 'CREATE TABLE broken (;');

      expect(() => runMigrations(db, dir)).toThrow('Migration failed: 002_bad.sql');

      const names = db.prepare('SELECT name FROM _migrations').pluck().all();
      expect(names).toEqual(['001_ok.sql']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
