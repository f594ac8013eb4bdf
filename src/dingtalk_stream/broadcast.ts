/**
 * Unbounded async FIFO. `push` never blocks; `next` waits until an item arrives or the queue is
 * closed. Items pushed before `close()` are still delivered.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @returns false if the queue is already closed and the item was dropped.
   */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * @param discard drop items not yet consumed instead of delivering them first.
   */
  close(discard = false): void {
    if (discard) this.items = [];
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const value = this.items[0];
      this.items.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}

export type BroadcastSubscription<T> = {
  readonly messages: AsyncQueue<T>;
  unsubscribe(): void;
};

/**
 * Multi-consumer publish channel: every subscriber gets every item published after it subscribed.
 */
export class Broadcaster<T> {
  private subscribers = new Set<AsyncQueue<T>>();
  private closed = false;

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  subscribe(): BroadcastSubscription<T> {
    const queue = new AsyncQueue<T>();
    if (this.closed) {
      queue.close();
    } else {
      this.subscribers.add(queue);
    }
    return {
      messages: queue,
      unsubscribe: () => {
        this.subscribers.delete(queue);
        queue.close();
      },
    };
  }

  /**
   * @returns number of subscribers the item was queued for.
   */
  publish(item: T): number {
    let delivered = 0;
    for (const queue of this.subscribers) {
      if (queue.push(item)) delivered++;
    }
    return delivered;
  }

  close(): void {
    this.closed = true;
    for (const queue of this.subscribers) {
      queue.close();
    }
    this.subscribers.clear();
  }
}
