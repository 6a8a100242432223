import type { RetentionResult } from '../retention/sweeper.js';

export type RunStatus = 'completed' | 'failed' | 'rejected';

export interface SourceStats {
  source: string;
  discovered: number;
  processed: number;
  failed: number;
  skipped: number;
  stale: number;
  malformed: number;
  durationMs: number;
  error?: string;
}

export interface CycleStats {
  id: string;
  startedAt: Date;
  finishedAt: Date | null;
  status: RunStatus;
  discovered: number;
  processed: number;
  failed: number;
  skipped: number;
  sources: SourceStats[];
  error?: string;
}

/**
 * Receives finished run results for the status surface.
 */
export interface StatsSink {
  recordCycle(stats: CycleStats): void;
  recordRetention(result: RetentionResult): void;
}

export function emptySourceStats(source: string): SourceStats {
  return { source, discovered: 0, processed: 0, failed: 0, skipped: 0, stale: 0, malformed: 0, durationMs: 0 };
}

/** Sum per-source counters into the cycle totals. */
export function totals(sources: readonly SourceStats[]): Pick<CycleStats, 'discovered' | 'processed' | 'failed' | 'skipped'> {
  return sources.reduce(
    (acc, s) => ({
      discovered: acc.discovered + s.discovered,
      processed: acc.processed + s.processed,
      failed: acc.failed + s.failed,
      skipped: acc.skipped + s.skipped,
    }),
    { discovered: 0, processed: 0, failed: 0, skipped: 0 },
  );
}
