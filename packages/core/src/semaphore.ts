import os from "node:os";

/**
 * Counting semaphore for limiting concurrency of async operations.
 * Waiters are served in FIFO order.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(maxConcurrent: number) {
    if (maxConcurrent < 1) {
      throw new Error("Semaphore maxConcurrent must be at least 1");
    }
    this.available = maxConcurrent;
  }

  /** Run `fn` with a semaphore slot. Waits if all slots are taken. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // slot passes straight to the next waiter
      next();
    } else {
      this.available++;
    }
  }
}

export function defaultParseConcurrency(configured = 0): number {
  if (configured > 0) return Math.round(configured);
  return Math.max(1, os.availableParallelism());
}
