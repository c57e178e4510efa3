/**
 * Many concurrent readers or one writer.
 *
 * A waiting writer blocks new readers, so a steady stream of reads cannot
 * starve it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waitingWriters: (() => void)[] = [];
  private waitingReaders: (() => void)[] = [];

  async read<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await task();
    } finally {
      this.releaseRead();
    }
  }

  async write<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await task();
    } finally {
      this.releaseWrite();
    }
  }

  private acquireRead(): Promise<void> {
    if (!this.writing && this.waitingWriters.length === 0) {
      this.readers++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waitingReaders.push(() => {
        this.readers++;
        resolve();
      });
    });
  }

  private releaseRead(): void {
    this.readers--;
    if (this.readers === 0) {
      this.wakeWriter();
    }
  }

  private acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waitingWriters.push(() => {
        this.writing = true;
        resolve();
      });
    });
  }

  private releaseWrite(): void {
    this.writing = false;
    if (!this.wakeWriter()) {
      const readers = this.waitingReaders;
      this.waitingReaders = [];
      for (const wake of readers) wake();
    }
  }

  private wakeWriter(): boolean {
    const next = this.waitingWriters.shift();
    if (!next) return false;
    next();
    return true;
  }
}
