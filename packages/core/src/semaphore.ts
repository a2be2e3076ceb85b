/**
 * @module semaphore
 * Counting semaphore with FIFO wake-up order.
 */

export class Semaphore {
  private count: number;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly max: number) {
    this.count = max;
  }

  async acquire(): Promise<void> {
    if (this.count > 0) {
      this.count--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.count = Math.min(this.count + 1, this.max);
    }
  }

  /** Run `fn` while holding one permit */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.count;
  }

  get waiting(): number {
    return this.queue.length;
  }
}
