interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: Error) => void;
}

/**
 * Unbounded queue bridging callback producers to a single async consumer.
 *
 * - `fail` delivers buffered items first, then rejects
 * - `close` ends the sequence immediately and discards the buffer
 */
export class AsyncChannel<T extends object> {
  private buffer: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private failure: Error | null = null;
  private closed: boolean = false;

  push(item: T): void {
    if (this.closed || this.failure) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
    } else {
      this.buffer.push(item);
    }
  }

  pushAll(items: Iterable<T>): void {
    for (const item of items) {
      this.push(item);
    }
  }

  fail(error: Error): void {
    if (this.closed || this.failure) return;

    this.failure = error;
    // Waiters only exist while the buffer is empty
    for (const waiter of this.waiters) {
      waiter.reject(error);
    }
    this.waiters = [];
  }

  close(): void {
    if (this.closed) return;

    this.closed = true;
    this.buffer = [];
    for (const waiter of this.waiters) {
      waiter.resolve({ done: true, value: undefined });
    }
    this.waiters = [];
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ done: false, value: item });
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
