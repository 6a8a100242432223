import { describe, it, expect, beforeEach } from 'vitest';
import { RetentionSweeper, type RetentionResult } from '../sweeper.js';
import { toArchiveRecord, toIndexPayload } from '../../store/records.js';
import type { VectorIndex } from '../../store/vectorIndex.js';
import { makeArticle } from '../../__tests__/helpers/fixtures.js';
import { InMemoryIndexStore, MemoryArchive } from '../../__tests__/helpers/fakes.js';

const NOW = new Date('2024-06-01T12:00:00Z');
const TZ = 'America/Los_Angeles';
const RECORD = toArchiveRecord(makeArticle(), NOW);

function seed(store: InMemoryIndexStore, total: number, old: number): void {
  for (let i = 0; i < total; i++) {
    const publishedAt = i < old ? new Date('2024-05-30T08:00:00Z') : new Date('2024-06-01T10:00:00Z');
    const article = makeArticle({ url: `https://example.com/news/${i}`, publishedAt });
    store.points.set(`id-${i}`, { id: `id-${i}`, vector: [1, 0, 0], payload: toIndexPayload(article, `k${i}`) });
  }
}

describe('RetentionSweeper', () => {
  let store: InMemoryIndexStore;
  let published: RetentionResult[];

  function sweeper(overrides: { archive?: MemoryArchive; indexFactory?: () => VectorIndex } = {}) {
    return new RetentionSweeper({
      indexFactory: overrides.indexFactory ?? store.connect,
      archive: overrides.archive ?? null,
      timeZone: TZ,
      onResult: (result) => published.push(result),
      now: () => NOW,
    });
  }

  beforeEach(() => {
    store = new InMemoryIndexStore();
    published = [];
  });

  it('deletes entries published before the cutoff', async () => {
    seed(store, 100, 30);
    const s = sweeper();

    const result = await s.sweep(24);

    expect(result).toMatchObject({
      status: 'completed',
      retentionHours: 24,
      deletedCount: 30,
      countBefore: 100,
      countAfter: 70,
      archiveDeleted: 0,
    });
    expect(result.cutoff.toISOString()).toBe('2024-05-31T12:00:00.000Z');
    expect(store.points.size).toBe(70);
    expect(store.closed).toBe(1);
    expect(s.state).toBe('completed');
    expect(s.last).toBe(result);
    expect(published).toEqual([result]);

    const again = await s.sweep(24);

    expect(again).toMatchObject({ status: 'completed', deletedCount: 0, countBefore: 70, countAfter: 70 });
    expect(store.points.size).toBe(70);
    expect(published).toEqual([result, again]);
  });

  it('prefers a count reported by the backend', async () => {
    seed(store, 10, 4);
    store.reportDeleted = true;

    const result = await sweeper().sweep(24);

    expect(result.deletedCount).toBe(4);
  });

  it('removes archive days before the cutoff day when asked', async () => {
    seed(store, 5, 2);
    const archive = new MemoryArchive();
    archive.records.set('2024/05/30/old-a.json', RECORD);
    archive.records.set('2024/05/31/edge-b.json', RECORD);
    archive.records.set('2024/06/01/new-c.json', RECORD);

    const result = await sweeper({ archive }).sweep(24, { includeArchive: true });

    expect(result.archiveDeleted).toBe(1);
    expect([...archive.records.keys()]).toEqual(['2024/05/31/edge-b.json', '2024/06/01/new-c.json']);
  });

  it('rejects a sweep while another is running', async () => {
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slowFactory = (): VectorIndex => {
      const index = store.connect();
      return {
        ...bind(index),
        count: async (filter) => {
          await gate;
          return index.count(filter);
        },
      };
    };
    const s = sweeper({ indexFactory: slowFactory });

    const first = s.sweep(24);
    expect(s.state).toBe('running');
    const second = await s.sweep(24);
    release();

    expect(second.status).toBe('rejected');
    expect(second.error).toBe('sweep already running');
    expect((await first).status).toBe('completed');
    expect(published.map((r) => r.status)).toEqual(['completed']);
  });

  it('records a failure without throwing', async () => {
    seed(store, 3, 1);
    store.deleteFailure = new Error('index offline');
    const s = sweeper();

    const result = await s.sweep(24);

    expect(result).toMatchObject({ status: 'failed', error: 'index offline', deletedCount: 0 });
    expect(s.state).toBe('failed');
    expect(store.closed).toBe(1);
    expect(published).toHaveLength(1);
  });

  it('fails when no index is configured', async () => {
    const s = new RetentionSweeper({ indexFactory: null, timeZone: TZ, now: () => NOW });
    const result = await s.sweep(24);
    expect(result).toMatchObject({ status: 'failed', error: 'No vector index configured' });
  });

  it('survives a failing result sink', async () => {
    seed(store, 2, 1);
    const s = new RetentionSweeper({
      indexFactory: store.connect,
      timeZone: TZ,
      now: () => NOW,
      onResult: () => {
        throw new Error('db locked');
      },
    });

    await expect(s.sweep(24)).resolves.toMatchObject({ status: 'completed', deletedCount: 1 });
  });

  it('clears the whole index', async () => {
    seed(store, 12, 0);

    expect(await sweeper().clearIndex()).toBe(12);
    expect(store.points.size).toBe(0);
  });
});

function bind(index: VectorIndex): VectorIndex {
  return {
    upsert: (points) => index.upsert(points),
    deleteWhere: (filter) => index.deleteWhere(filter),
    count: (filter) => index.count(filter),
    stats: () => index.stats(),
    healthCheck: () => index.healthCheck(),
    ensureCollection: () => index.ensureCollection(),
    close: () => index.close(),
  };
}
