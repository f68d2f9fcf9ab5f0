/**
 * Promise-based lock that runs critical sections one at a time, in call order
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Wait for the lock; the returned function releases it and is safe to call twice
   */
  async acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.pending++;
    await previous;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.pending--;
      release();
    };
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}
