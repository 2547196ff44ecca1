/**
 * WorkChannel - Unbounded multi-consumer queue
 */

import { LineFreqError } from "./errors";

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * FIFO queue with single delivery: each sent item goes to exactly one
 * receiver. Receivers that find the queue empty wait in arrival order.
 *
 * @example
 * ```ts
 * const channel = new WorkChannel<string>();
 * const consumer = (async () => {
 *   for await (const line of channel) handle(line);
 * })();
 * channel.send("a");
 * channel.close();
 * await consumer;
 * ```
 */
export class WorkChannel<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private head: number = 0;
  private waiters: Waiter<T>[] = [];
  private _closed: boolean = false;

  /**
   * Enqueue an item. Never waits for space.
   */
  send(item: T): void {
    if (this._closed) {
      throw new LineFreqError("ChannelClosed", "send", "Cannot send on a closed channel");
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
      return;
    }

    this.items.push(item);
  }

  /**
   * Take the next item. Resolves `done` once the channel is closed and empty.
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.head < this.items.length) {
      const value = this.items[this.head];
      this.head++;
      this.compact();
      return Promise.resolve({ done: false, value });
    }

    if (this._closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Signal end of stream. Pending items can still be received.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;

    // Waiters only exist while the queue is empty
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter({ done: true, value: undefined });
    }
  }

  /** Items sent but not yet received */
  get size(): number {
    return this.items.length - this.head;
  }

  get closed(): boolean {
    return this._closed;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  /**
   * Drop consumed slots once they dominate the backing array.
   */
  private compact(): void {
    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
