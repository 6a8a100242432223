import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { buildRuntime } from '../runtime.js';
import { ConfigSchema } from '../../shared/config.js';
import { ConfigError } from '../../shared/errors.js';
import { buildRegistry } from '../../source/registry.js';
import { getLatestRetentionRun } from '../../db/runs.js';
import { makeSource } from '../../__tests__/helpers/fixtures.js';
import { InMemoryIndexStore } from '../../__tests__/helpers/fakes.js';

describe('buildRuntime', () => {
  let db: Database.Database;
  let dir: string;

  beforeEach(() => {
    db = new Database(':memory:');
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-runtime-'));
  });

  afterEach(() => {
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function config(raw: Record<string, unknown> = {}) {
    return ConfigSchema.parse({ archive: { dir: path.join(dir, 'archive') }, render: { enabled: false }, ...raw });
  }

  it('runs on the archive alone when no embedder is configured', () => {
    const store = new InMemoryIndexStore();
    const runtime = buildRuntime(config(), {
      db,
      registry: buildRegistry([makeSource()]),
      indexFactory: store.connect,
    });

    expect(runtime.persistence.indexConfigured).toBe(false);
    expect(runtime.persistence.archiveConfigured).toBe(true);
    expect(runtime.health.get('index')).toMatchObject({ status: 'unhealthy', detail: 'embedding.api_key is missing' });
    expect(runtime.health.get('renderer')?.status).toBe('disabled');
    expect(runtime.health.get('llm')?.status).toBe('disabled');
    expect(runtime.renderer).toBeNull();
  });

  it('wires the index and records sweeps in the run log', async () => {
    const store = new InMemoryIndexStore();
    const runtime = buildRuntime(config({ embedding: { api_key: 'test-secret' } }), {
      db,
      registry: buildRegistry([makeSource()]),
      indexFactory: store.connect,
    });

    expect(runtime.persistence.indexConfigured).toBe(true);
    expect(runtime.health.isHealthy('index')).toBe(true);

    const result = await runtime.sweeper.sweep(24);

    expect(result.status).toBe('completed');
    expect(getLatestRetentionRun(db)?.id).toBe(result.id);
  });

  it('marks the cleaner unhealthy when enabled without a key', () => {
    const runtime = buildRuntime(config({ llm: { clean_content: true } }), {
      db,
      registry: buildRegistry([]),
      indexFactory: null,
    });

    expect(runtime.health.get('llm')?.status).toBe('unhealthy');
  });

  it('refuses to start without any persistence sink', () => {
    expect(() =>
      buildRuntime(config({ archive: { enabled: false } }), { db, registry: buildRegistry([]), indexFactory: null }),
    ).toThrow(ConfigError);
  });
});
