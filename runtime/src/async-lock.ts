/**
 * Single-permit FIFO lock. Waiters are released in the order they queued.
 */
export class AsyncLock {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  get pending(): number {
    return this.queue.length;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter; the lock stays held.
      next();
      return;
    }
    this.locked = false;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
