/**
 * Fixed-capacity async queue with one consumer.
 *
 * offer() never waits: it returns false when the queue is full or closed.
 * take() waits for the next item and yields `{ done: true }` once the queue
 * is closed and drained.
 */

export type TakeResult<T> = { done: false; value: T } | { done: true };

export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private waiter: ((result: TakeResult<T>) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
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

  offer(item: T): boolean {
    if (this.closed) return false;

    // Hand straight to a parked consumer; the buffer is empty in that case
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: false, value: item });
      return true;
    }

    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  take(): Promise<TakeResult<T>> {
    if (this.items.length > 0) {
      const value = this.items.shift();
      if (value !== undefined) {
        return Promise.resolve({ done: false, value });
      }
    }
    if (this.closed) {
      return Promise.resolve({ done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('BoundedQueue supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Returns true only for the call that actually closed the queue. */
  close(): boolean {
    if (this.closed) return false;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: true });
    }
    return true;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = await this.take();
      if (next.done) return;
      yield next.value;
    }
  }
}
