/**
 * FIFO async mutex. Waiters are granted the lock in arrival order.
 */
export class Mutex {
  private readonly queue: (() => void)[] = [];
  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
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
      this.locked = false;
    }
  }

  /**
   * Run `task` while holding the lock. The lock is released even if the
   * task throws.
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
