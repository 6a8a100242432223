/**
 * Scheduler — node-cron job that runs ingestion cycles.
 * Started by `newsharvest start` alongside the status server.
 */

import cron from 'node-cron';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { CycleOrchestrator } from './orchestrator.js';

export interface SchedulerOptions {
  cycleCron: string;
  /** Run one cycle immediately on start. */
  runOnStart?: boolean;
}

export class Scheduler {
  private task: cron.ScheduledTask | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly orchestrator: Pick<CycleOrchestrator, 'runCycle'>,
    private readonly opts: SchedulerOptions,
  ) {
    if (!cron.validate(opts.cycleCron)) {
      throw new ConfigError(`Invalid cycle_cron expression: ${opts.cycleCron}`, { cycle_cron: opts.cycleCron });
    }
  }

  get started(): boolean {
    return this.task !== null;
  }

  start(): void {
    if (this.task) return;

    this.task = cron.schedule(this.opts.cycleCron, () => {
      this.trigger();
    });
    logger.info({ cycle_cron: this.opts.cycleCron }, 'Scheduler started');

    if (this.opts.runOnStart) this.trigger();
  }

  /** Start a cycle unless one started by this scheduler is still running. */
  trigger(): void {
    if (this.inFlight) {
      logger.warn('Previous scheduled cycle still running, skipping tick');
      return;
    }
    this.inFlight = this.orchestrator
      .runCycle()
      .then(() => undefined)
      .catch((err: unknown) => {
        logger.error({ error: errorMessage(err) }, 'Scheduled cycle failed');
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  /**
   * Stop scheduling and wait for a running cycle to finish.
   */
  async stop(): Promise<void> {
    this.task?.stop();
    this.task = null;
    if (this.inFlight) await this.inFlight;
    logger.info('Scheduler stopped');
  }
}
