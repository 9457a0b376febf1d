/**
 * Fixed-capacity FIFO with a non-blocking producer side and a single
 * waiting consumer.
 *
 * - `offer()` never waits: it either stores the item or reports `false`.
 * - `take()` is the only suspension point. It resolves with the next item,
 *   or `null` on timeout, abort, or once the queue is closed and empty.
 * - `close()` stops further offers; items already stored can still be taken.
 */
export class BoundedQueue<T> {
  readonly capacity: number;
  private readonly items: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private isClosed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer (received ${capacity})`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get full(): boolean {
    return this.items.length >= this.capacity;
  }

  /** Stores `item` if there is room. Returns false when full or closed. */
  offer(item: T): boolean {
    if (this.isClosed || this.full) return false;

    this.items.push(item);

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(this.items.shift() ?? null);
    }
    return true;
  }

  /**
   * Waits up to `timeoutMs` for the next item.
   *
   * Only one `take()` may be pending at a time.
   */
  take(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.isClosed || signal?.aborted) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error('BoundedQueue allows a single pending take()'));
    }

    return new Promise<T | null>((resolve) => {
      const finish = (item: T | null): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
        resolve(item);
      };
      const onAbort = (): void => finish(null);
      const timer = setTimeout(() => finish(null), timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = finish;
    });
  }

  /** Removes and returns everything currently stored. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  /** Idempotent. Wakes a pending `take()` with `null`. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }
}
