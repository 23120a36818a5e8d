/**
 * Async Queue
 *
 * Unbounded single-consumer queue that bridges push-style sources (socket
 * callbacks, test injection) to `for await` consumers.
 */

export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private ended = false;

  get closed(): boolean {
    return this.ended;
  }

  /** Enqueue an item. Returns false once the queue has ended. */
  push(value: T): boolean {
    if (this.ended) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.items.push({ value });
    }
    return true;
  }

  /** End the queue. Buffered items are still delivered, then iteration stops. */
  end(): void {
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const item = this.items.shift();
        if (item) return Promise.resolve({ value: item.value, done: false });
        if (this.ended) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => this.waiters.push(resolve));
      },
    };
  }
}
