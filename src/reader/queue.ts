export const DEFAULT_QUEUE_CAPACITY = 10;

interface Waiter<T> {
  resolve: (item: T | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * Bounded FIFO between the reader poll loop and whoever consumes scans.
 *
 * push() never blocks: when full, the oldest entry is evicted (drop-oldest), so
 * the freshest scan always survives. pop() waits up to a timeout.
 */
export class ScanQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ScanQueue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Returns the evicted entry when the push displaced one.
   */
  push(item: T): T | undefined {
    const waiter = this.waiters.shift();
    if (waiter) {
      // a waiter only exists while the queue is empty
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return undefined;
    }

    let evicted: T | undefined;
    if (this.items.length >= this.capacity) {
      evicted = this.items.shift();
    }
    this.items.push(item);
    return evicted;
  }

  tryPop(): T | null {
    return this.items.shift() ?? null;
  }

  pop(timeoutMs: number): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Drops queued entries and releases every pending pop() with null.
   */
  clear(): void {
    this.items = [];
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }
}
