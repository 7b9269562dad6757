export type MutexRelease = () => void;

export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  public isLocked(): boolean {
    return this.locked;
  }

  public async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Resolves with a release function. The lock is handed directly to the
   * next waiter, so FIFO order holds across acquisitions.
   */
  public async acquire(): Promise<MutexRelease> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
    return this.createRelease();
  }

  private createRelease(): MutexRelease {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }

    this.locked = false;
  }
}
