import type { ContentArchive } from '../store/archive.js';
import type { VectorIndexFactory } from '../store/vectorIndex.js';
import type { RunStatus } from '../pipeline/stats.js';
import { RetentionError, errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { datePath, hoursAgo } from '../shared/time.js';
import { logger } from '../shared/logger.js';

export type SweeperState = 'idle' | 'running' | 'completed' | 'failed';

export interface RetentionResult {
  id: string;
  status: RunStatus;
  retentionHours: number;
  cutoff: Date;
  startedAt: Date;
  deletedCount: number;
  archiveDeleted: number;
  countBefore: number | null;
  countAfter: number | null;
  durationSeconds: number;
  error?: string;
}

export interface SweepOptions {
  /** Also drop archive days strictly before the cutoff's day. */
  includeArchive?: boolean;
}

export interface RetentionSweeperOptions {
  indexFactory: VectorIndexFactory | null;
  archive?: ContentArchive | null;
  timeZone: string;
  onResult?: (result: RetentionResult) => void;
  now?: () => Date;
}

/**
 * Deletes index entries older than a retention window. One sweep at a time: a call
 * made while another sweep is running returns a `rejected` result without waiting.
 */
export class RetentionSweeper {
  private current: SweeperState = 'idle';
  private lastResult: RetentionResult | null = null;
  private readonly now: () => Date;

  constructor(private readonly opts: RetentionSweeperOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  get state(): SweeperState {
    return this.current;
  }

  get last(): RetentionResult | null {
    return this.lastResult;
  }

  async sweep(retentionHours: number, sweepOpts: SweepOptions = {}): Promise<RetentionResult> {
    const startedAt = this.now();
    const cutoff = hoursAgo(retentionHours, startedAt);
    const base = {
      id: generateId(),
      retentionHours,
      cutoff,
      startedAt,
      deletedCount: 0,
      archiveDeleted: 0,
      countBefore: null,
      countAfter: null,
      durationSeconds: 0,
    };

    if (this.current === 'running') {
      logger.warn({ retentionHours }, 'Retention sweep already running, rejecting');
      return { ...base, status: 'rejected', error: 'sweep already running' };
    }

    this.current = 'running';
    let result: RetentionResult;
    try {
      result = { ...base, ...(await this.run(cutoff, sweepOpts)), status: 'completed' };
      this.current = 'completed';
      logger.info(
        { cutoff: cutoff.toISOString(), deleted: result.deletedCount, archiveDeleted: result.archiveDeleted },
        'Retention sweep completed',
      );
    } catch (err) {
      result = { ...base, status: 'failed', error: errorMessage(err) };
      this.current = 'failed';
      logger.error({ cutoff: cutoff.toISOString(), error: errorMessage(err) }, 'Retention sweep failed');
    }

    result.durationSeconds = (this.now().getTime() - startedAt.getTime()) / 1000;
    this.lastResult = result;
    this.publish(result);
    return result;
  }

  private async run(
    cutoff: Date,
    sweepOpts: SweepOptions,
  ): Promise<Pick<RetentionResult, 'deletedCount' | 'archiveDeleted' | 'countBefore' | 'countAfter'>> {
    const factory = this.opts.indexFactory;
    if (!factory) throw new RetentionError('No vector index configured');

    const index = factory();
    const { countBefore, countAfter, reported } = await (async () => {
      try {
        const before = await index.count();
        const { deleted } = await index.deleteWhere({ publishedBefore: cutoff });
        return { countBefore: before, countAfter: await index.count(), reported: deleted };
      } finally {
        await index.close();
      }
    })();

    let archiveDeleted = 0;
    const archive = this.opts.archive;
    if (sweepOpts.includeArchive && archive) {
      archiveDeleted = await archive.deleteBefore(datePath(cutoff, this.opts.timeZone));
    }

    return {
      deletedCount: reported ?? Math.max(0, countBefore - countAfter),
      archiveDeleted,
      countBefore,
      countAfter,
    };
  }

  /**
   * Delete every index entry. Destructive; used by the operator command only.
   */
  async clearIndex(): Promise<number> {
    const factory = this.opts.indexFactory;
    if (!factory) throw new RetentionError('No vector index configured');
    if (this.current === 'running') throw new RetentionError('Cannot clear the index while a sweep is running');

    const index = factory();
    try {
      const before = await index.count();
      const { deleted } = await index.deleteWhere({});
      logger.warn({ deleted: deleted ?? before }, 'Vector index cleared');
      return deleted ?? before;
    } finally {
      await index.close();
    }
  }

  private publish(result: RetentionResult): void {
    if (!this.opts.onResult) return;
    try {
      this.opts.onResult(result);
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Failed to publish retention result');
    }
  }
}
