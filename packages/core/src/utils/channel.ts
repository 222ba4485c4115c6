/**
 * Completion channel
 * Buffered single-consumer queue that is drained with `for await` until closed
 */

export class CompletionChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiting: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  /**
   * @param capacity Maximum number of undelivered values; senders never wait, so
   * exceeding it is a programming error
   */
  constructor(private readonly capacity: number) {}

  public send(value: T): void {
    if (this.closed) {
      throw new Error("send on closed channel");
    }
    const consumer = this.waiting.shift();
    if (consumer) {
      consumer({ value, done: false });
      return;
    }
    if (this.buffer.length >= this.capacity) {
      throw new Error(`channel capacity ${this.capacity} exceeded`);
    }
    this.buffer.push(value);
  }

  /**
   * Signal that no more values will be sent; buffered values are still delivered
   */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const consumer of this.waiting.splice(0)) {
      consumer({ value: undefined, done: true });
    }
  }

  public isClosed(): boolean {
    return this.closed;
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }
}
