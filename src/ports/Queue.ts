/**
 * FIFO channel shared by producers and consumers. Each pushed item is
 * delivered to exactly one `pop` caller.
 */
export interface Queue<T> {
  push(item: T): Promise<void>;
  /** Waits for the next item; resolves `undefined` once `signal` aborts. */
  pop(signal: AbortSignal): Promise<T | undefined>;
}
