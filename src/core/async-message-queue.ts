/**
 * AsyncMessageQueue<T>: bounded async iterable queue with a single consumer.
 *
 * Usage:
 *   const queue = new AsyncMessageQueue<FailureReport>(10);
 *   queue.enqueue(report);    // producer side, never blocks
 *   queue.finish();           // signal end of stream
 *   for await (const report of queue) { ... }  // consumer side
 *
 * Items already queued when `finish()` is called are still delivered.
 */

export class AsyncMessageQueue<T> {
  private readonly queue: T[] = [];
  private resolve: ((value: IteratorResult<T>) => void) | null = null;
  private done = false;

  constructor(readonly maxSize = Number.POSITIVE_INFINITY) {
    if (!(maxSize >= 1)) {
      throw new RangeError("AsyncMessageQueue maxSize must be at least 1");
    }
  }

  /**
   * Push an item, waking a pending consumer if one is waiting.
   * Returns false when the queue is finished or already holds `maxSize` items.
   */
  enqueue(item: T): boolean {
    if (this.done) return false;
    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: item, done: false });
      return true;
    }
    if (this.queue.length >= this.maxSize) return false;
    this.queue.push(item);
    return true;
  }

  /** Signal that no more items will be produced. */
  finish(): void {
    if (this.done) return;
    this.done = true;

    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: undefined, done: true });
    }
  }

  get isFinished(): boolean {
    return this.done;
  }

  get size(): number {
    return this.queue.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const queued = this.queue.shift();
        if (queued !== undefined) {
          return Promise.resolve({ value: queued, done: false });
        }
        if (this.done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.resolve = resolve;
        });
      },
    };
  }
}
