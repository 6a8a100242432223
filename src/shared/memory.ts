import { logger } from './logger.js';
import { sleep as defaultSleep } from './utils.js';

export interface MemoryReading {
  rssMb: number;
  heapUsedMb: number;
  overHighWater: boolean;
}

export interface MemoryGuardOptions {
  highWaterMb: number;
  cooldownMs: number;
  readUsage?: () => NodeJS.MemoryUsage;
  collect?: (() => void) | null;
  sleep?: (ms: number) => Promise<void>;
}

function exposedGc(): (() => void) | null {
  // Only present when node runs with --expose-gc.
  const gc: unknown = Reflect.get(globalThis, 'gc');
  if (typeof gc !== 'function') return null;
  return () => {
    Reflect.apply(gc, globalThis, []);
  };
}

/**
 * Soft backpressure between work items: above the high-water mark, force a GC pass
 * (when exposed) and pause for the cooldown.
 */
export class MemoryGuard {
  private readonly readUsage: () => NodeJS.MemoryUsage;
  private readonly collect: (() => void) | null;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly opts: MemoryGuardOptions) {
    this.readUsage = opts.readUsage ?? (() => process.memoryUsage());
    this.collect = opts.collect === undefined ? exposedGc() : opts.collect;
    this.wait = opts.sleep ?? defaultSleep;
  }

  read(): MemoryReading {
    const usage = this.readUsage();
    const rssMb = usage.rss / 1024 / 1024;
    return {
      rssMb,
      heapUsedMb: usage.heapUsed / 1024 / 1024,
      overHighWater: rssMb > this.opts.highWaterMb,
    };
  }

  /** Returns true when pressure relief was applied. */
  async relieve(): Promise<boolean> {
    const before = this.read();
    if (!before.overHighWater) return false;

    logger.warn(
      { rssMb: Math.round(before.rssMb), highWaterMb: this.opts.highWaterMb },
      'Memory above high-water mark, applying backpressure',
    );
    this.collect?.();
    if (this.opts.cooldownMs > 0) await this.wait(this.opts.cooldownMs);

    const after = this.read();
    logger.info({ rssMb: Math.round(after.rssMb) }, 'Memory after cooldown');
    return true;
  }
}
