import type { SourceDefinition } from './registry.js';

/**
 * A discovered but not yet extracted article reference. Lives for one cycle.
 */
export interface CandidateItem {
  url: string;
  title: string;
  publishedAt: Date;
  sourceName: string;
  author?: string;
  category?: string;
  /** Feed description/summary, kept for the last extraction fallback. */
  summary?: string;
}

/**
 * Per-source discovery counters, filled in while the sequence is consumed.
 */
export interface DiscoveryReport {
  source: string;
  entries: number;
  yielded: number;
  stale: number;
  malformed: number;
  itemErrors: number;
  error?: string;
}

export function emptyReport(source: string): DiscoveryReport {
  return { source, entries: 0, yielded: 0, stale: 0, malformed: 0, itemErrors: 0 };
}

export interface DiscoveryContext {
  now: Date;
  cutoff: Date;
  report: DiscoveryReport;
}

/**
 * One handler per source kind. `discover` may throw SourceFetchError for a failure of
 * the top-level document; item-level problems are counted in the report and skipped.
 */
export interface SourceHandler {
  readonly kind: SourceDefinition['kind'];
  discover(source: SourceDefinition, ctx: DiscoveryContext): AsyncIterable<CandidateItem>;
}
