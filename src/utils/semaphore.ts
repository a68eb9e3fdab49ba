/**
 * Counting semaphore for bounding in-flight async work.
 *
 * Waiters are admitted in FIFO order. `run()` releases its permit on every exit
 * path, including a rejected task.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }

    await new Promise<void>(resolve => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
      return;
    }

    if (this.available >= this.permits) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.available++;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Permits currently held */
  get inUse(): number {
    return this.permits - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }
}
