/**
 * TaskLoop: Task Queue
 *
 * Unbounded FIFO. push() never blocks; a consumer suspends on
 * waitForItems() until push() wakes it, there is no polling.
 */

export class TaskQueue<T> {
  private items: T[] = [];
  private waiters: Array<() => void> = [];

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);

    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  /** Remove and return everything queued, oldest first. */
  takeAll(): T[] {
    const batch = this.items;
    this.items = [];
    return batch;
  }

  /**
   * Resolve true once at least one item is queued, false if `signal` aborts first.
   */
  waitForItems(signal: AbortSignal): Promise<boolean> {
    if (this.items.length > 0) return Promise.resolve(true);
    if (signal.aborted) return Promise.resolve(false);

    return new Promise((resolve) => {
      const wake = (): void => {
        signal.removeEventListener("abort", onAbort);
        resolve(true);
      };
      const onAbort = (): void => {
        this.waiters = this.waiters.filter(w => w !== wake);
        resolve(false);
      };
      this.waiters.push(wake);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}
