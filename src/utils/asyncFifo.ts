import { abortReason } from "./time.js";

interface Waiter<T> {
  deliver: (item: T) => void;
}

/**
 * Unbounded FIFO with timed, abortable takes. `shift` resolves `undefined`
 * on timeout and rejects with the signal's reason on abort.
 */
export class AsyncFifo<T> {
  private readonly items: T[] = [];
  private waiters: Array<Waiter<T>> = [];

  public get size(): number {
    return this.items.length;
  }

  public push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.deliver(item);
      return;
    }
    this.items.push(item);
  }

  public shift(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<T | undefined>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.waiters = this.waiters.filter((entry) => entry !== waiter);
      };
      const waiter: Waiter<T> = {
        deliver: (item) => {
          cleanup();
          resolve(item);
        },
      };
      const onAbort = () => {
        cleanup();
        if (signal) {
          reject(abortReason(signal));
        }
      };
      const timer = setTimeout(() => {
        cleanup();
        resolve(undefined);
      }, timeoutMs);

      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Removes and returns every buffered item, oldest first. */
  public drain(): T[] {
    return this.items.splice(0, this.items.length);
  }
}
