/**
 * Async mutex
 * FIFO lock over a promise chain; one holder at a time
 */

export type Release = () => void;

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /**
   * Wait for the lock; resolves with the function that releases it
   */
  public acquire(): Promise<Release> {
    const previous = this.tail;
    let release: Release = () => undefined;
    const current = new Promise<void>((resolve) => {
      let released = false;
      release = () => {
        if (!released) {
          released = true;
          this.holders--;
          resolve();
        }
      };
    });
    this.holders++;
    this.tail = previous.then(() => current);
    return previous.then(() => release);
  }

  /**
   * Run `fn` while holding the lock
   */
  public async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * True while the lock is held or awaited
   */
  public isLocked(): boolean {
    return this.holders > 0;
  }
}
