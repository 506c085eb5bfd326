/**
 * Single-holder FIFO lock. Guards the acquire + exchange sequence so only one
 * command is ever in flight on the shared connection.
 */
export class DispatchLock {
  private held = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return;
    }
    return new Promise<void>((resolve) => {
      // Ownership passes straight to the next waiter; `held` stays true.
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.held = false;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get locked(): boolean {
    return this.held;
  }

  get waiting(): number {
    return this.queue.length;
  }
}
