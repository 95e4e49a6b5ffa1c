type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

/**
 * Unbounded single-consumer queue exposed as an async iterator.
 * Producers push in read order; the consumer pulls. Nothing is reordered.
 */
export class OutputChannel<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private waiter?: Waiter<T>;
  private closed = false;
  private failure?: { error: unknown };

  constructor(private readonly onReturn?: () => void) {}

  push(value: T): void {
    if (this.closed) {
      return;
    }

    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = undefined;
      resolve({ value, done: false });
      return;
    }

    this.buffer.push(value);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.settleWaiter();
  }

  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    this.failure = { error };
    this.closed = true;
    this.settleWaiter();
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }

    if (this.failure) {
      const { error } = this.failure;
      this.failure = undefined;
      return Promise.reject(error);
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  return(): Promise<IteratorResult<T>> {
    const wasOpen = !this.closed;
    this.buffer.length = 0;
    this.failure = undefined;
    this.closed = true;
    this.settleWaiter();
    if (wasOpen) {
      this.onReturn?.();
    }
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private settleWaiter(): void {
    const waiter = this.waiter;
    if (!waiter) {
      return;
    }
    this.waiter = undefined;

    if (this.failure) {
      const { error } = this.failure;
      this.failure = undefined;
      waiter.reject(error);
      return;
    }

    waiter.resolve({ value: undefined, done: true });
  }
}
