export type ResultState = "pending" | "value" | "error";

/**
 * Single-assignment result handed back to the admitting handler. The first
 * `resolve` or `reject` wins; later calls return false and change nothing.
 */
export class ResultPromise<T> {
  public readonly promise: Promise<T>;
  private current: ResultState = "pending";
  private readonly settleValue: (value: T) => void;
  private readonly settleError: (reason: unknown) => void;

  public constructor() {
    let settleValue: (value: T) => void = () => undefined;
    let settleError: (reason: unknown) => void = () => undefined;
    this.promise = new Promise<T>((resolve, reject) => {
      settleValue = resolve;
      settleError = reject;
    });
    this.settleValue = settleValue;
    this.settleError = settleError;
    // An abandoned request may never be awaited; keep its rejection handled.
    this.promise.catch(() => undefined);
  }

  public get state(): ResultState {
    return this.current;
  }

  public isSettled(): boolean {
    return this.current !== "pending";
  }

  public resolve(value: T): boolean {
    if (this.current !== "pending") {
      return false;
    }
    this.current = "value";
    this.settleValue(value);
    return true;
  }

  public reject(error: unknown): boolean {
    if (this.current !== "pending") {
      return false;
    }
    this.current = "error";
    this.settleError(error);
    return true;
  }
}
