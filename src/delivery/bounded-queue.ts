/**
 * Raised by {@link BoundedQueue.put} once the queue has been closed.
 */
export class QueueClosedError extends Error {
  constructor() {
    super('Queue is closed');
    this.name = 'QueueClosedError';
  }
}

interface PendingPut<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Fixed-capacity FIFO buffer with waiting producers and consumers.
 *
 * - `put` resolves once the item is buffered; while the buffer is full,
 *   producers wait in arrival order.
 * - `take` resolves with the oldest item, waiting while the buffer is empty,
 *   and resolves `undefined` once the queue is closed and empty.
 * - `close` rejects waiting and future producers; buffered items stay takeable.
 */
export class BoundedQueue<T extends object> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly pendingPuts: PendingPut<T>[] = [];
  private readonly pendingTakes: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Queue capacity must be a positive integer, got ${capacity}`,
      );
    }
  }

  /** Number of buffered items (waiting producers not included). */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  put(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }

    const taker = this.pendingTakes.shift();
    if (taker) {
      taker(item);
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.pendingPuts.push({ item, resolve, reject });
    });
  }

  take(): Promise<T | undefined> {
    const next = this.items.shift();
    if (next) {
      this.admitPendingPut();
      return Promise.resolve(next);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>(resolve => {
      this.pendingTakes.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const pending of this.pendingPuts.splice(0)) {
      pending.reject(new QueueClosedError());
    }
    for (const taker of this.pendingTakes.splice(0)) {
      taker(undefined);
    }
  }

  /**
   * Removes and returns every buffered item.
   */
  drain(): T[] {
    const drained = this.items.splice(0);
    while (this.items.length < this.capacity && this.pendingPuts.length > 0) {
      this.admitPendingPut();
    }
    return drained;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.take();
      if (item === undefined) return;
      yield item;
    }
  }

  private admitPendingPut(): void {
    const pending = this.pendingPuts.shift();
    if (!pending) return;
    this.items.push(pending.item);
    pending.resolve();
  }
}
