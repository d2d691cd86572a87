/**
 * @file outbound-channel.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Bounded single-producer/single-consumer queue between the broadcaster
 * and a connection's outbound loop.
 *
 * `offer` never waits: it returns false when the queue is full or closed.
 * `next` resolves with the next item, or `undefined` once the channel is closed.
 */
export class OutboundChannel<T> {
  private readonly buffer: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private _closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('OutboundChannel capacity must be a positive integer');
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Hands the item to a waiting consumer or buffers it.
   */
  offer(item: T): boolean {
    if (this._closed) {
      return false;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      return false;
    }

    this.buffer.push(item);
    return true;
  }

  next(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this._closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Closes the channel, wakes the consumer and discards buffered items.
   * Returns the number of discarded items.
   */
  close(): number {
    if (this._closed) {
      return 0;
    }
    this._closed = true;

    const discarded = this.buffer.length;
    this.buffer.length = 0;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }

    return discarded;
  }
}
