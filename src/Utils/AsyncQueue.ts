/**
 * FIFO queue with a single asynchronous consumer.
 * Producers never block; the consumer waits with a bound so it can do periodic checks.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private wake?: () => void;

  get size() {
    return this.items.length;
  }

  put(item: T) {
    this.items.push(item);
    this.wake?.();
  }

  /** Removes and returns every queued item matching `predicate`, keeping the order of the rest. */
  remove(predicate: (item: T) => boolean): T[] {
    const removed = this.items.filter(predicate);
    this.items = this.items.filter((item) => !predicate(item));
    return removed;
  }

  /**
   * Resolves with the oldest item, or with `undefined` when nothing arrived within `timeoutMs`.
   * Rejects with the abort reason when `signal` aborts first.
   */
  get(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.wake) return Promise.reject(new Error('AsyncQueue supports a single consumer'));

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.wake = undefined;
      };
      const onAbort = () => {
        cleanup();
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        cleanup();
        resolve(undefined);
      }, timeoutMs);

      this.wake = () => {
        cleanup();
        resolve(this.items.shift());
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
