/**
 * @module primitives/fanout-channel
 * @description Bounded multi-consumer broadcast channel.
 *
 * Each subscriber owns a ring of at most `capacity` pending items.
 * Publishing never waits on a consumer: when a subscriber's backlog is
 * full the oldest item is dropped and that subscriber's lag counter
 * grows. There is no replay; a new subscriber only sees items published
 * after it subscribed.
 */

/** Default per-subscriber backlog. */
export const DEFAULT_CHANNEL_CAPACITY = 256;

/**
 * A single consumer's view of the channel.
 */
export class Subscription<T> implements AsyncIterable<T> {
  private readonly backlog: T[] = [];
  private waiter: ((item: T | null) => void) | null = null;
  private closed = false;
  private lagged = 0;

  constructor(
    private readonly capacity: number,
    private readonly onClose: (sub: Subscription<T>) => void
  ) {}

  /** @internal Called by the channel. Returns false once closed. */
  push(item: T): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }
    if (this.backlog.length >= this.capacity) {
      this.backlog.shift();
      this.lagged++;
    }
    this.backlog.push(item);
    return true;
  }

  /**
   * Resolves with the next item, or `null` once the subscription is
   * closed and drained.
   */
  next(): Promise<T | null> {
    const item = this.backlog.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Number of items dropped since the last call. Resets the counter.
   */
  takeLagged(): number {
    const skipped = this.lagged;
    this.lagged = 0;
    return skipped;
  }

  get pending(): number {
    return this.backlog.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Stop receiving. Pending items are discarded and iteration ends. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.backlog.length = 0;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.next();
      if (item === null) return;
      yield item;
    }
  }
}

/**
 * FanoutChannel: publish once, deliver to every live subscriber.
 *
 * @example
 * ```ts
 * const channel = new FanoutChannel<string>();
 * const sub = channel.subscribe();
 * channel.publish("hello"); // 1
 * await sub.next(); // "hello"
 * ```
 */
export class FanoutChannel<T> {
  private readonly subscribers = new Set<Subscription<T>>();

  constructor(readonly capacity: number = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  subscribe(): Subscription<T> {
    const sub = new Subscription<T>(this.capacity, (closed) => {
      this.subscribers.delete(closed);
    });
    this.subscribers.add(sub);
    return sub;
  }

  /**
   * Deliver `item` to every subscriber.
   * @returns Number of subscribers it was delivered to.
   */
  publish(item: T): number {
    let receivers = 0;
    for (const sub of this.subscribers) {
      if (sub.push(item)) receivers++;
    }
    return receivers;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /** Close every subscription. */
  close(): void {
    for (const sub of [...this.subscribers]) {
      sub.close();
    }
  }
}
