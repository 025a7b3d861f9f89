/**
 * @file bounded-queue.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * FIFO queue with a fixed capacity, many producers and a single consumer.
 *
 * Producers never wait: offer() refuses an item when the queue is full.
 * The consumer waits in take() until an item arrives or its signal aborts,
 * whichever comes first.
 */
export class BoundedQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly _capacity: number;
  private waiter: ((item: T | undefined) => void) | null = null;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
  }

  get capacity(): number {
    return this._capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this._capacity;
  }

  /**
   * Enqueues an item without blocking.
   * Returns false if the queue is at capacity.
   */
  offer(item: T): boolean {
    // A waiting consumer implies an empty queue: hand the item over directly
    if (this.waiter) {
      const deliver = this.waiter;
      this.waiter = null;
      deliver(item);
      return true;
    }

    if (this.isFull) {
      return false;
    }

    this.items.push(item);
    return true;
  }

  /**
   * Resolves with the oldest item, waiting for one if the queue is empty.
   * Resolves undefined once the signal is aborted and nothing is queued.
   */
  take(signal: AbortSignal): Promise<T | undefined> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (signal.aborted) {
      return Promise.resolve(undefined);
    }

    if (this.waiter) {
      return Promise.reject(new Error('BoundedQueue supports a single consumer'));
    }

    return new Promise<T | undefined>((resolve) => {
      const onAbort = (): void => {
        if (this.waiter === deliver) {
          this.waiter = null;
          resolve(undefined);
        }
      };

      const deliver = (item: T | undefined): void => {
        signal.removeEventListener('abort', onAbort);
        resolve(item);
      };

      this.waiter = deliver;
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Drops every queued item.
   */
  clear(): void {
    this.items.length = 0;
  }
}
