import pLimit from 'p-limit';
import type { SourceRegistry, SourceDefinition } from '../source/registry.js';
import type { Discovery } from '../source/discover.js';
import { emptyReport } from '../source/adapter.js';
import type { DuplicateFilter } from '../source/dedup.js';
import type { ContentExtractor } from '../extract/extractor.js';
import type { PersistenceCoordinator } from '../store/persist.js';
import type { RetentionResult, RetentionSweeper } from '../retention/sweeper.js';
import type { MemoryGuard } from '../shared/memory.js';
import { errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { logger } from '../shared/logger.js';
import { emptySourceStats, totals, type CycleStats, type SourceStats, type StatsSink } from './stats.js';

export interface RetentionSchedule {
  hours: number;
  intervalHours: number;
  includeArchive: boolean;
}

export interface CycleOrchestratorOptions {
  registry: SourceRegistry;
  discovery: Pick<Discovery, 'discover'>;
  extractor: Pick<ContentExtractor, 'extract'>;
  persistence: Pick<PersistenceCoordinator, 'persist'>;
  dedup: DuplicateFilter;
  sourceConcurrency: number;
  memory?: MemoryGuard | null;
  sweeper?: RetentionSweeper | null;
  retention?: RetentionSchedule | null;
  stats?: StatsSink | null;
  now?: () => Date;
}

export interface RunCycleOptions {
  /** Restrict the cycle to these source names. */
  sources?: string[];
}

/**
 * One pass over the active sources: discover, skip duplicates, extract, persist and
 * admit. Sources run concurrently up to `sourceConcurrency`; items within a source run
 * in discovery order.
 */
export class CycleOrchestrator {
  private running = false;
  private lastSweepAt: Date | null = null;
  private readonly now: () => Date;

  constructor(private readonly opts: CycleOrchestratorOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  async runCycle(runOpts: RunCycleOptions = {}): Promise<CycleStats> {
    const startedAt = this.now();
    const id = generateId();

    if (this.running) {
      logger.warn('Cycle already running, rejecting overlapping invocation');
      return {
        id,
        startedAt,
        finishedAt: startedAt,
        status: 'rejected',
        discovered: 0,
        processed: 0,
        failed: 0,
        skipped: 0,
        sources: [],
        error: 'cycle already running',
      };
    }

    this.running = true;
    let stats: CycleStats;
    try {
      const sources = this.selectSources(runOpts.sources);
      logger.info({ cycle: id, sources: sources.length }, 'Cycle started');

      const limit = pLimit(Math.max(1, this.opts.sourceConcurrency));
      const perSource = await Promise.all(
        sources.map((source) =>
          limit(async () => {
            await this.opts.memory?.relieve();
            return this.runSource(source);
          }),
        ),
      );

      stats = { id, startedAt, finishedAt: this.now(), status: 'completed', ...totals(perSource), sources: perSource };
      logger.info(
        { cycle: id, discovered: stats.discovered, processed: stats.processed, failed: stats.failed, skipped: stats.skipped },
        'Cycle completed',
      );
    } catch (err) {
      stats = {
        id,
        startedAt,
        finishedAt: this.now(),
        status: 'failed',
        discovered: 0,
        processed: 0,
        failed: 0,
        skipped: 0,
        sources: [],
        error: errorMessage(err),
      };
      logger.error({ cycle: id, error: stats.error }, 'Cycle failed');
    } finally {
      this.running = false;
    }

    this.publish(stats);
    await this.maybeSweep();
    return stats;
  }

  private selectSources(names?: string[]): readonly SourceDefinition[] {
    if (!names || names.length === 0) return this.opts.registry.active;
    return names.map((name) => {
      const source = this.opts.registry.get(name);
      if (!source) throw new Error(`Unknown source: ${name}`);
      return source;
    });
  }

  private async runSource(source: SourceDefinition): Promise<SourceStats> {
    const { dedup, discovery, extractor, persistence } = this.opts;
    const started = Date.now();
    const stats = emptySourceStats(source.name);
    const report = emptyReport(source.name);

    for await (const item of discovery.discover(source, report)) {
      stats.discovered++;

      if (!dedup.reserve(item.url, item.title)) {
        stats.skipped++;
        continue;
      }

      try {
        const article = await extractor.extract(item, source);
        const result = await persistence.persist(article, { checkBeforeWrite: source.archive_check_before_write });
        if (result.admissible) {
          dedup.admit(item.url, item.title);
          stats.processed++;
        } else {
          stats.failed++;
          logger.warn({ source: source.name, url: item.url, error: result.error }, 'Article not persisted, will retry next cycle');
        }
      } catch (err) {
        stats.failed++;
        logger.warn({ source: source.name, url: item.url, error: errorMessage(err) }, 'Article failed');
      } finally {
        dedup.release(item.url);
      }
    }

    stats.stale = report.stale;
    stats.malformed = report.malformed;
    stats.failed += report.itemErrors;
    if (report.error) stats.error = report.error;
    stats.durationMs = Date.now() - started;

    logger.info({ ...stats }, 'Source finished');
    return stats;
  }

  /**
   * Run the retention sweep when its interval has elapsed since the last one.
   */
  async maybeSweep(): Promise<RetentionResult | null> {
    const { sweeper, retention } = this.opts;
    if (!sweeper || !retention) return null;

    const now = this.now();
    if (this.lastSweepAt && now.getTime() - this.lastSweepAt.getTime() < retention.intervalHours * 3600 * 1000) {
      return null;
    }

    this.lastSweepAt = now;
    return sweeper.sweep(retention.hours, { includeArchive: retention.includeArchive });
  }

  private publish(stats: CycleStats): void {
    if (!this.opts.stats) return;
    try {
      this.opts.stats.recordCycle(stats);
    } catch (err) {
      logger.error({ cycle: stats.id, error: errorMessage(err) }, 'Failed to record cycle stats');
    }
  }
}
