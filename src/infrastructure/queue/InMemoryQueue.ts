import type { Queue } from "../../ports/Queue";

type Waiter<T> = {
  resolve: (item: T | undefined) => void;
  signal: AbortSignal;
  onAbort: () => void;
};

/**
 * Process-local blocking FIFO. Waiting consumers are served in arrival order,
 * and each pushed item goes to exactly one of them.
 */
export class InMemoryQueue<T> implements Queue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  async push(item: T): Promise<void> {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  pop(signal: AbortSignal): Promise<T | undefined> {
    if (signal.aborted) return Promise.resolve(undefined);
    if (this.items.length > 0) return Promise.resolve(this.items.shift());

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        signal,
        onAbort: () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(undefined);
        }
      };
      signal.addEventListener("abort", waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  size(): number {
    return this.items.length;
  }

  waiting(): number {
    return this.waiters.length;
  }
}
