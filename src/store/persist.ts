import type { ExtractedArticle } from '../extract/extractor.js';
import type { Embedder } from '../llm/embedder.js';
import { PersistenceError, errorMessage, type SinkName } from '../shared/errors.js';
import { RetryExhaustedError, withRetry, type RetryPolicy } from '../shared/retry.js';
import { logger } from '../shared/logger.js';
import type { ContentArchive } from './archive.js';
import type { VectorIndexFactory } from './vectorIndex.js';
import {
  archiveKey,
  fromArchiveRecord,
  indexId,
  toArchiveRecord,
  toIndexPayload,
  type ArchiveRecord,
} from './records.js';

export type PersistErrorKind = 'archive' | 'index' | 'both' | 'index_unavailable';

export interface PersistResult {
  archived: boolean;
  indexed: boolean;
  /** The archive already held the record and no write was made. */
  archiveSkipped: boolean;
  archiveKey: string;
  indexId: string;
  /** Whether the article may be admitted to the duplicate filter. */
  admissible: boolean;
  error?: PersistErrorKind;
}

export interface FailureEntry {
  sink: SinkName;
  url: string;
  title: string;
  source: string;
  error: string;
  record: ArchiveRecord;
}

export interface StoredFailure extends FailureEntry {
  id: number;
  createdAt: string;
}

/**
 * Record of writes that exhausted their retries, kept for manual re-drive.
 */
export interface FailureLedger {
  record(entry: FailureEntry): void;
  pending(ids?: number[]): StoredFailure[];
  markResolved(id: number): void;
  /** Resolve every pending entry for `url` on `sink`; returns how many there were. */
  resolveFor(url: string, sink: SinkName): number;
}

export interface PersistOptions {
  checkBeforeWrite?: boolean;
}

export interface PersistenceCoordinatorOptions {
  archive: ContentArchive | null;
  indexFactory: VectorIndexFactory | null;
  embedder: Embedder | null;
  ledger?: FailureLedger | null;
  timeZone: string;
  indexRetry: RetryPolicy;
  archiveRetry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

interface SinkOutcome {
  ok: boolean;
  skipped: boolean;
  error?: string;
  unavailable?: boolean;
}

const SKIPPED: SinkOutcome = { ok: false, skipped: false };

export interface RedriveOutcome {
  id: number;
  sink: SinkName;
  url: string;
  resolved: boolean;
  error?: string;
}

/**
 * Writes an article to the archive and the vector index independently. Each sink has
 * its own retry policy; a failure in one never blocks the other.
 */
export class PersistenceCoordinator {
  private readonly now: () => Date;

  constructor(private readonly opts: PersistenceCoordinatorOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  get indexConfigured(): boolean {
    return this.opts.indexFactory !== null && this.opts.embedder !== null;
  }

  get archiveConfigured(): boolean {
    return this.opts.archive !== null;
  }

  async persist(article: ExtractedArticle, persistOpts: PersistOptions = {}): Promise<PersistResult> {
    const key = archiveKey(article, this.opts.timeZone);
    const id = indexId(article);
    const record = toArchiveRecord(article, this.now());

    const [archive, index] = await Promise.all([
      this.writeArchive(key, record, persistOpts.checkBeforeWrite ?? false),
      this.writeIndex(article, id, key),
    ]);

    const result: PersistResult = {
      archived: archive.ok,
      indexed: index.ok,
      archiveSkipped: archive.skipped,
      archiveKey: key,
      indexId: id,
      admissible: this.indexConfigured ? index.ok : archive.ok,
    };

    const archiveFailed = this.archiveConfigured && !archive.ok;
    const indexFailed = this.indexConfigured && !index.ok;
    if (archiveFailed && indexFailed) result.error = 'both';
    else if (archiveFailed) result.error = 'archive';
    else if (indexFailed) result.error = index.unavailable ? 'index_unavailable' : 'index';

    if (archiveFailed) this.recordFailure('archive', record, archive.error);
    if (indexFailed) this.recordFailure('index', record, index.error);
    if (archive.ok) this.supersedeFailures('archive', record.url);
    if (index.ok) this.supersedeFailures('index', record.url);

    logger.debug({ url: article.url, ...result }, 'Article persisted');
    return result;
  }

  private async writeArchive(key: string, record: ArchiveRecord, checkBeforeWrite: boolean): Promise<SinkOutcome> {
    const archive = this.opts.archive;
    if (!archive) return SKIPPED;

    try {
      return await withRetry(
        this.opts.archiveRetry,
        async () => {
          if (checkBeforeWrite && (await archive.exists(key))) {
            return { ok: true, skipped: true };
          }
          const written = await archive.put(key, record);
          return { ok: true, skipped: !written };
        },
        { label: 'Archive write', context: { key }, sleep: this.opts.sleep },
      );
    } catch (err) {
      logger.warn({ key, url: record.url, error: errorMessage(err) }, 'Archive write failed, continuing');
      return { ok: false, skipped: false, error: errorMessage(err) };
    }
  }

  private async writeIndex(article: ExtractedArticle, id: string, key: string): Promise<SinkOutcome> {
    const { indexFactory, embedder } = this.opts;
    if (!indexFactory || !embedder) return SKIPPED;

    const payload = toIndexPayload(article, key);
    let vector: number[] | null = null;

    try {
      await withRetry(
        this.opts.indexRetry,
        async () => {
          const embedded =
            vector ?? (await embedder.embed(`${payload.title}\n\n${article.translatedContent ?? article.content}`));
          vector = embedded;
          const index = indexFactory();
          try {
            await index.upsert([{ id, vector: embedded, payload }]);
          } finally {
            await index.close();
          }
        },
        { label: 'Index upsert', context: { id, url: article.url }, sleep: this.opts.sleep },
      );
      return { ok: true, skipped: false };
    } catch (err) {
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      logger.error({ id, url: article.url, title: article.title, error: errorMessage(cause) }, 'Index write failed');
      return { ok: false, skipped: false, error: errorMessage(cause), unavailable: vector === null };
    }
  }

  private recordFailure(sink: SinkName, record: ArchiveRecord, error = 'unknown error'): void {
    const ledger = this.opts.ledger;
    if (!ledger) return;
    try {
      ledger.record({ sink, url: record.url, title: record.title, source: record.sourceName, error, record });
    } catch (err) {
      logger.error({ sink, url: record.url, error: errorMessage(err) }, 'Failed to record persistence failure');
    }
  }

  /** A later successful write makes earlier failures for the same URL stale. */
  private supersedeFailures(sink: SinkName, url: string): void {
    const ledger = this.opts.ledger;
    if (!ledger) return;
    try {
      const resolved = ledger.resolveFor(url, sink);
      if (resolved > 0) logger.info({ sink, url, resolved }, 'Earlier persistence failures resolved');
    } catch (err) {
      logger.error({ sink, url, error: errorMessage(err) }, 'Failed to resolve earlier persistence failures');
    }
  }

  /**
   * Re-persist ledger entries. An entry is resolved once the sink it failed on succeeds.
   */
  async redrive(ids?: number[]): Promise<RedriveOutcome[]> {
    const ledger = this.opts.ledger;
    if (!ledger) throw new PersistenceError('No failure ledger configured', 'index');

    const outcomes: RedriveOutcome[] = [];
    for (const failure of ledger.pending(ids)) {
      const article = fromArchiveRecord(failure.record);
      const key = archiveKey(article, this.opts.timeZone);

      const outcome =
        failure.sink === 'archive'
          ? await this.writeArchive(key, failure.record, true)
          : await this.writeIndex(article, indexId(article), key);

      if (outcome.ok) ledger.markResolved(failure.id);
      outcomes.push({ id: failure.id, sink: failure.sink, url: failure.url, resolved: outcome.ok, error: outcome.error });
    }

    logger.info(
      { attempted: outcomes.length, resolved: outcomes.filter((o) => o.resolved).length },
      'Persistence failures re-driven',
    );
    return outcomes;
  }
}
