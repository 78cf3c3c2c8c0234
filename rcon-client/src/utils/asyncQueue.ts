// Async queue for serializing client actions

/**
 * Unbounded FIFO consumed with for-await-of.
 * Closing ends iteration once the remaining items are drained.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiting: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  /**
   * Offer an item to the queue (non-blocking)
   * @throws Error if the queue is closed
   */
  offer(item: T): void {
    if (this.closed) {
      throw new Error('Queue is closed');
    }

    const waiter = this.waiting.shift();
    if (waiter) {
      // Someone is waiting for an item - give it to them immediately
      waiter({ done: false, value: item });
    } else {
      this.queue.push(item);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      if (this.queue.length > 0) {
        const [item] = this.queue.splice(0, 1);
        yield item;
      } else if (this.closed) {
        return;
      } else {
        const result = await new Promise<IteratorResult<T, undefined>>((resolve) => {
          this.waiting.push(resolve);
        });
        if (result.done) {
          return;
        }
        yield result.value;
      }
    }
  }

  size(): number {
    return this.queue.length;
  }

  /**
   * Close the queue; pending consumers are released
   */
  close(): void {
    this.closed = true;

    for (const waiter of this.waiting) {
      waiter({ done: true, value: undefined });
    }
    this.waiting = [];
  }

  isClosed(): boolean {
    return this.closed;
  }
}
