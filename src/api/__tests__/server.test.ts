import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { createApp, errorCodeToHttpStatus, type AppContext } from '../server.js';
import { runMigrations } from '../../db/migrate.js';
import { insertCycleRun, insertRetentionRun } from '../../db/runs.js';
import { insertFailure, markFailureResolved } from '../../db/failures.js';
import { HealthRegistry } from '../../pipeline/health.js';
import { ConfigSchema } from '../../shared/config.js';
import { toArchiveRecord } from '../../store/records.js';
import type { RetentionResult, SweeperState } from '../../retention/sweeper.js';
import { makeArticle } from '../../__tests__/helpers/fixtures.js';

function result(overrides: Partial<RetentionResult> = {}): RetentionResult {
  return {
    id: 'r1',
    status: 'completed',
    retentionHours: 24,
    cutoff: new Date('2024-05-31T12:00:00Z'),
    startedAt: new Date('2024-06-01T12:00:00Z'),
    deletedCount: 30,
    archiveDeleted: 0,
    countBefore: 100,
    countAfter: 70,
    durationSeconds: 0.2,
    ...overrides,
  };
}

interface HealthBody {
  status: string;
  version: string;
  uptime: number;
  retention: string;
  components: Array<{ name: string; status: string }>;
}

async function readJson<T>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

class StubSweeper {
  state: SweeperState = 'idle';
  calls: Array<[number, { includeArchive?: boolean }]> = [];
  next: RetentionResult = result();

  async sweep(hours: number, opts: { includeArchive?: boolean } = {}): Promise<RetentionResult> {
    this.calls.push([hours, opts]);
    return this.next;
  }
}

describe('status API', () => {
  let db: Database.Database;
  let health: HealthRegistry;
  let sweeper: StubSweeper;
  let ctx: AppContext;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    health = new HealthRegistry();
    sweeper = new StubSweeper();
    ctx = {
      db,
      config: ConfigSchema.parse({ retention: { hours: 72, include_archive: true } }),
      health,
      sweeper,
      startedAt: new Date(Date.now() - 5000),
    };
  });

  afterEach(() => {
    db.close();
  });

  it('reports health with component status', async () => {
    health.register('index', async () => true);
    health.mark('renderer', 'disabled');

    const res = await createApp(ctx).request('/api/health');
    const body = await readJson<HealthBody>(res);

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', version: '0.1.0', retention: 'idle' });
    expect(body.uptime).toBeGreaterThanOrEqual(5);
    expect(body.components.map((c) => c.name)).toEqual(['index', 'renderer']);
  });

  it('reports degraded when a probe fails', async () => {
    health.register('index', async () => false);

    const body = await readJson<HealthBody>(await createApp(ctx).request('/api/health'));

    expect(body.status).toBe('degraded');
  });

  it('lists recorded cycles newest first', async () => {
    for (const [id, at] of [
      ['c1', '2024-06-01T10:00:00Z'],
      ['c2', '2024-06-01T11:00:00Z'],
    ] as const) {
      insertCycleRun(db, {
        id,
        startedAt: new Date(at),
        finishedAt: new Date(at),
        status: 'completed',
        discovered: 2,
        processed: 2,
        failed: 0,
        skipped: 0,
        sources: [],
      });
    }
    const app = createApp(ctx);

    const list = await readJson<{ cycles: Array<{ id: string }> }>(await app.request('/api/cycles?limit=1'));
    const latest = await readJson<unknown>(await app.request('/api/cycles/latest'));

    expect(list.cycles.map((c) => c.id)).toEqual(['c2']);
    expect(latest).toMatchObject({ id: 'c2', processed: 2, sources: [] });
  });

  it('answers 404 before the first cycle and retention run', async () => {
    const app = createApp(ctx);
    expect((await app.request('/api/cycles/latest')).status).toBe(404);
    expect((await app.request('/api/retention/latest')).status).toBe(404);
  });

  it('returns the latest retention run', async () => {
    insertRetentionRun(db, result());

    const body = await readJson<unknown>(await createApp(ctx).request('/api/retention/latest'));

    expect(body).toMatchObject({ id: 'r1', deleted_count: 30, count_after: 70 });
  });

  it('runs a manual sweep with configured defaults', async () => {
    const res = await createApp(ctx).request('/api/retention', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(sweeper.calls).toEqual([[72, { includeArchive: true }]]);
    expect(await res.json()).toMatchObject({ status: 'completed', deletedCount: 30 });
  });

  it('passes explicit sweep parameters', async () => {
    await createApp(ctx).request('/api/retention', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ hours: 6, include_archive: false }),
    });

    expect(sweeper.calls).toEqual([[6, { includeArchive: false }]]);
  });

  it('answers 409 when a sweep is already running', async () => {
    sweeper.next = result({ status: 'rejected', error: 'sweep already running' });

    const res = await createApp(ctx).request('/api/retention', { method: 'POST' });

    expect(res.status).toBe(409);
  });

  it('answers 500 for a failed sweep', async () => {
    sweeper.next = result({ status: 'failed', error: 'index offline' });

    const res = await createApp(ctx).request('/api/retention', { method: 'POST' });

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ error: 'index offline' });
  });

  it('rejects invalid sweep parameters', async () => {
    const res = await createApp(ctx).request('/api/retention', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ hours: -1 }),
    });

    expect(res.status).toBe(400);
    expect(sweeper.calls).toEqual([]);
  });

  it('lists pending failures, or all with all=1', async () => {
    const record = toArchiveRecord(makeArticle(), new Date('2024-06-01T12:00:00Z'));
    const base = { title: record.title, source: record.sourceName, error: 'down', record };
    const a = insertFailure(db, { ...base, sink: 'index', url: 'https://example.com/a' });
    insertFailure(db, { ...base, sink: 'archive', url: 'https://example.com/b' });
    markFailureResolved(db, a);
    const app = createApp(ctx);

    type FailureList = { failures: Array<{ url: string }> };
    const pending = await readJson<FailureList>(await app.request('/api/failures'));
    const all = await readJson<FailureList>(await app.request('/api/failures?all=1'));

    expect(pending.failures.map((f) => f.url)).toEqual(['https://example.com/b']);
    expect(all.failures).toHaveLength(2);
  });

  it('answers 404 for unknown routes', async () => {
    const res = await createApp(ctx).request('/api/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('errorCodeToHttpStatus', () => {
  it('maps error codes to statuses', () => {
    expect(errorCodeToHttpStatus('CONFIG_ERROR')).toBe(400);
    expect(errorCodeToHttpStatus('RETENTION_ERROR')).toBe(409);
    expect(errorCodeToHttpStatus('INDEX_ERROR')).toBe(502);
    expect(errorCodeToHttpStatus('TIMEOUT')).toBe(504);
    expect(errorCodeToHttpStatus('SOMETHING_ELSE')).toBe(500);
  });
});
