import { emptyReport, type SourceHandler, type CandidateItem, type DiscoveryReport } from './adapter.js';
import type { SourceDefinition } from './registry.js';
import { FeedHandler } from './feed.js';
import { ListingHandler } from './listing.js';
import { hoursAgo } from '../shared/time.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface DiscoveryOptions {
  timeoutMs: number;
  userAgent: string;
  now?: () => Date;
  handlers?: SourceHandler[];
}

/**
 * Selects the handler for a source's kind and turns a top-level source failure into an
 * empty sequence, so one unreachable source never aborts the others.
 */
export class Discovery {
  private readonly handlers = new Map<SourceDefinition['kind'], SourceHandler>();
  private readonly now: () => Date;

  constructor(opts: DiscoveryOptions) {
    this.now = opts.now ?? (() => new Date());
    const handlers = opts.handlers ?? [
      new FeedHandler(opts.timeoutMs, opts.userAgent),
      new ListingHandler(opts.timeoutMs, opts.userAgent),
    ];
    for (const handler of handlers) this.handlers.set(handler.kind, handler);
  }

  async *discover(
    source: SourceDefinition,
    report: DiscoveryReport = emptyReport(source.name),
  ): AsyncGenerator<CandidateItem> {
    const handler = this.handlers.get(source.kind);
    if (!handler) {
      report.error = `No handler for source kind: ${source.kind}`;
      logger.error({ source: source.name, kind: source.kind }, report.error);
      return;
    }

    const now = this.now();
    const cutoff = hoursAgo(source.recency_hours, now);

    try {
      yield* handler.discover(source, { now, cutoff, report });
    } catch (err) {
      report.error = errorMessage(err);
      logger.warn({ source: source.name, url: source.endpoint, error: report.error }, 'Source discovery failed');
      return;
    }

    logger.debug({ ...report }, 'Source discovery finished');
  }

  /** Drain a source into a list. */
  async collect(source: SourceDefinition, report?: DiscoveryReport): Promise<CandidateItem[]> {
    const items: CandidateItem[] = [];
    for await (const item of this.discover(source, report)) items.push(item);
    return items;
  }
}
