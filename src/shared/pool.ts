/**
 * Fixed-size pool of reusable resources with scoped checkout. Resources are created
 * lazily up to `size`; callers beyond that wait in FIFO order.
 */
export class ResourcePool<R> {
  private readonly idle: R[] = [];
  private readonly waiters: Array<(resource: R) => void> = [];
  private created = 0;
  private closed = false;

  constructor(
    private readonly size: number,
    private readonly factory: () => R,
    private readonly destroy: (resource: R) => Promise<void> | void = () => undefined,
  ) {}

  get inUse(): number {
    return this.created - this.idle.length;
  }

  async use<T>(fn: (resource: R) => Promise<T>): Promise<T> {
    const resource = await this.acquire();
    try {
      return await fn(resource);
    } finally {
      this.release(resource);
    }
  }

  private acquire(): Promise<R> {
    if (this.closed) return Promise.reject(new Error('Pool is closed'));
    const ready = this.idle.pop();
    if (ready !== undefined) return Promise.resolve(ready);
    if (this.created < this.size) {
      this.created++;
      return Promise.resolve(this.factory());
    }
    return new Promise<R>((resolve) => this.waiters.push(resolve));
  }

  private release(resource: R): void {
    const next = this.waiters.shift();
    if (next) {
      next(resource);
      return;
    }
    this.idle.push(resource);
  }

  async close(): Promise<void> {
    this.closed = true;
    const resources = this.idle.splice(0, this.idle.length);
    await Promise.all(resources.map((r) => this.destroy(r)));
  }
}
