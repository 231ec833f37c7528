/**
 * @module primitives/state-lock
 * @description Async mutual exclusion around the daemon state.
 *
 * Callers queue on a promise chain; each critical section starts only
 * after the previous one settled, whether it resolved or threw.
 */

export class StateLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  /**
   * Run `fn` once every earlier critical section has finished. The lock
   * is released on every path before the returned promise settles.
   */
  runExclusive<R>(fn: () => R | Promise<R>): Promise<R> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => gate);

    return previous.then(async () => {
      this.held = true;
      try {
        return await fn();
      } finally {
        this.held = false;
        release();
      }
    });
  }

  get isLocked(): boolean {
    return this.held;
  }
}
