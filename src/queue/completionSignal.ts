import { abortReason } from "../utils/time.js";

/**
 * One-shot broadcast flag. Once set it stays set; every waiter, whether it
 * started waiting before or after `set()`, is released.
 */
export class CompletionSignal {
  private fired = false;
  private waiters: Array<() => void> = [];

  public isSet(): boolean {
    return this.fired;
  }

  public set(): void {
    if (this.fired) {
      return;
    }

    this.fired = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  public wait(signal?: AbortSignal): Promise<void> {
    if (this.fired) {
      return Promise.resolve();
    }
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((waiter) => waiter !== release);
        if (signal) {
          reject(abortReason(signal));
        }
      };
      const release = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      this.waiters.push(release);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
