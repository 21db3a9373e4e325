/**
 * Unbounded FIFO with a single consumer. `next()` resolves `undefined` once
 * the queue is closed or the consumer's signal aborts.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T | undefined) => void) | undefined;
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.items.length;
  }

  /** Whether a consumer is currently parked in `next()`. */
  get hasConsumer(): boolean {
    return this.waiter !== undefined;
  }

  /** Returns `false` when the queue is closed and the item was dropped. */
  push(item: T): boolean {
    if (this.isClosed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  next(signal?: AbortSignal): Promise<T | undefined> {
    if (this.isClosed || signal?.aborted) return Promise.resolve(undefined);
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.waiter) return Promise.reject(new Error("AsyncQueue already has a consumer"));

    return new Promise((resolve) => {
      const onAbort = () => {
        if (this.waiter === settle) this.waiter = undefined;
        resolve(undefined);
      };
      const settle = (item: T | undefined) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };
      this.waiter = settle;
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Drops pending items and releases a parked consumer. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.items.length = 0;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(undefined);
  }
}
