/**
 * Fixed-capacity, non-blocking channel between a producer (process output
 * readers, the orchestrator) and a consumer (a log viewer, a test).
 *
 * Producers never wait: `trySend` reports a full or closed channel by
 * returning false. Consumers iterate with `for await`; iteration ends once
 * the channel is closed and drained.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Messages refused because the channel was full or closed. */
  get dropped(): number {
    return this.droppedCount;
  }

  trySend(value: T): boolean {
    if (this.closed) {
      this.droppedCount++;
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }

    this.buffer.push(value);
    return true;
  }

  /** Idempotent. Pending receivers finish once the buffer is drained. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  receive(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Take everything currently buffered without waiting. */
  drain(): T[] {
    return this.buffer.splice(0);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
