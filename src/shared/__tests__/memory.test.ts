import { describe, it, expect, vi } from 'vitest';
import { MemoryGuard } from '../memory.js';

const MB = 1024 * 1024;

function usage(rssMb: number): NodeJS.MemoryUsage {
  return { rss: rssMb * MB, heapTotal: 0, heapUsed: 100 * MB, external: 0, arrayBuffers: 0 };
}

describe('MemoryGuard', () => {
  it('does nothing under the high-water mark', async () => {
    const collect = vi.fn();
    const sleep = vi.fn(async () => undefined);
    const guard = new MemoryGuard({ highWaterMb: 800, cooldownMs: 10000, readUsage: () => usage(300), collect, sleep });

    expect(await guard.relieve()).toBe(false);
    expect(collect).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('collects and cools down above the mark', async () => {
    const collect = vi.fn();
    const sleep = vi.fn(async () => undefined);
    const guard = new MemoryGuard({ highWaterMb: 800, cooldownMs: 10000, readUsage: () => usage(900), collect, sleep });

    expect(await guard.relieve()).toBe(true);
    expect(collect).toHaveBeenCalledOnce();
    expect(sleep).toHaveBeenCalledWith(10000);
  });

  it('reports readings in megabytes', () => {
    const guard = new MemoryGuard({ highWaterMb: 800, cooldownMs: 0, readUsage: () => usage(512), collect: null });
    expect(guard.read()).toEqual({ rssMb: 512, heapUsedMb: 100, overHighWater: false });
  });
});
