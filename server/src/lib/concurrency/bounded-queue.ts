/**
 * Bounded Queue
 * FIFO buffer with a hard capacity and an async consumer side.
 *
 * Producers never wait: offer() returns immediately with the outcome.
 * A single consumer awaits take(), which resolves null once the queue is closed and empty.
 */

export type QueueOverflowPolicy = 'drop_oldest' | 'reject';

export type OfferResult = 'accepted' | 'dropped_oldest' | 'rejected' | 'closed';

interface Waiter<T> {
  resolve: (item: T | null) => void;
  reject: (err: Error) => void;
}

export class BoundedQueue<T extends NonNullable<unknown>> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: Error | null = null;

  constructor(
    private readonly capacity: number,
    private readonly policy: QueueOverflowPolicy
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): OfferResult {
    if (this.closed) {
      return 'closed';
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return 'accepted';
    }

    if (this.items.length >= this.capacity) {
      if (this.policy === 'reject') {
        return 'rejected';
      }
      this.items.shift();
      this.items.push(item);
      return 'dropped_oldest';
    }

    this.items.push(item);
    return 'accepted';
  }

  take(): Promise<T | null> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    const head = this.items.shift();
    if (head !== undefined) {
      return Promise.resolve(head);
    }

    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Stop accepting items. Buffered items stay readable; waiting consumers get null.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(null);
    }
  }

  /**
   * Drop buffered items, returning how many were discarded
   */
  clear(): number {
    const dropped = this.items.length;
    this.items = [];
    return dropped;
  }

  /**
   * Close with an error: buffered items are discarded and every take() rejects
   */
  fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    this.closed = true;
    this.items = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }
}
