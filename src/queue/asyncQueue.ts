export type OverflowPolicy = 'drop_oldest' | 'drop_newest';

export type QueueConfig = {
  /** Infinity only for queues whose producer is already bounded. */
  maxSize: number;
  overflow: OverflowPolicy;
};

export type PushResult =
  | { accepted: true; dropped?: undefined }
  | { accepted: true; dropped: 'oldest' }
  | { accepted: false; dropped: 'newest' | 'closed' };

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

const defaultConfig: QueueConfig = {
  maxSize: Number.POSITIVE_INFINITY,
  overflow: 'drop_oldest',
};

/**
 * Single-consumer async queue. Producers never wait: when the queue is full
 * the overflow policy decides which item is lost.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private readonly config: QueueConfig;
  private closed = false;

  private stats = {
    totalPushed: 0,
    totalDropped: 0,
  };

  constructor(config: Partial<QueueConfig> = {}) {
    this.config = { ...defaultConfig, ...config };
    if (!(this.config.maxSize >= 1)) {
      throw new RangeError(`queue maxSize must be >= 1, got ${this.config.maxSize}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStats(): { totalPushed: number; totalDropped: number; size: number } {
    return { ...this.stats, size: this.items.length };
  }

  push(item: T): PushResult {
    if (this.closed) {
      return { accepted: false, dropped: 'closed' };
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      this.stats.totalPushed += 1;
      waiter({ value: item, done: false });
      return { accepted: true };
    }

    if (this.items.length >= this.config.maxSize) {
      this.stats.totalDropped += 1;
      if (this.config.overflow === 'drop_newest') {
        return { accepted: false, dropped: 'newest' };
      }
      this.items.shift();
      this.items.push(item);
      this.stats.totalPushed += 1;
      return { accepted: true, dropped: 'oldest' };
    }

    this.items.push(item);
    this.stats.totalPushed += 1;
    return { accepted: true };
  }

  /** Resolves with the next item, or done once the queue is closed and drained. */
  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stops accepting items. With discard, buffered items are dropped and the
   * consumer ends immediately; otherwise it drains what is left first.
   * Discarding also applies to a queue that was already closed for draining.
   * Returns the number of items discarded.
   */
  close(options: { discard?: boolean } = {}): number {
    let discarded = 0;
    if (options.discard && this.items.length > 0) {
      discarded = this.items.length;
      this.stats.totalDropped += discarded;
      this.items.length = 0;
    }
    if (this.closed) {
      return discarded;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    return discarded;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close({ discard: true });
        return { value: undefined, done: true };
      },
    };
  }
}
