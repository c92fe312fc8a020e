/**
 * FIFO mutex built on a promise chain.
 *
 * Callers run strictly one at a time in the order they called `run`.
 * A rejected task releases the lock for the next waiter.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `task` once every previously queued task has settled.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Whether a task is running or queued */
  isLocked(): boolean {
    return this.pending > 0;
  }

  /** Number of tasks running or queued */
  get queueLength(): number {
    return this.pending;
  }
}
