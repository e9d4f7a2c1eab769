/**
 * AsyncMessageQueue<T>: bounded async iterable queue with a single consumer.
 *
 *   const queue = new AsyncMessageQueue<InboundEvent>(1024);
 *   queue.enqueue(event);        // producer side, false when full or finished
 *   queue.finish();              // no more items; the consumer drains what is left
 *   for await (const event of queue) { ... }
 */

export class AsyncMessageQueue<T> {
  private readonly items: T[] = [];
  private waiting: ((value: IteratorResult<T, undefined>) => void) | null = null;
  private done = false;

  constructor(readonly capacity = Number.POSITIVE_INFINITY) {}

  /** Push an item, waking the consumer if it is waiting. False when the item was not accepted. */
  enqueue(item: T): boolean {
    if (this.done) return false;
    if (this.waiting) {
      const wake = this.waiting;
      this.waiting = null;
      wake({ value: item, done: false });
      return true;
    }
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /** Signal that no more items will be produced. Items already queued are still delivered. */
  finish(): void {
    if (this.done) return;
    this.done = true;
    if (this.waiting) {
      const wake = this.waiting;
      this.waiting = null;
      wake({ value: undefined, done: true });
    }
  }

  get size(): number {
    return this.items.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: (): Promise<IteratorResult<T, undefined>> => {
        if (this.items.length > 0) {
          const [item] = this.items.splice(0, 1);
          return Promise.resolve({ value: item, done: false });
        }
        if (this.done) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
    };
  }
}
