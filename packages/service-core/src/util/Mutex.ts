export type PromiseFunction<T> = () => Promise<T>;

/**
 * Mutex maintains a queue of Promise-returning functions that
 * are executed sequentially (whereas normally they would execute their async code concurrently).
 */
export class Mutex {
  private queue: (() => void)[] = [];
  private locked = false;

  /**
   * Place a function on the queue.
   * Returns a Promise that is resolved with the result of the function.
   */
  async exclusiveLock<T>(promiseFn: PromiseFunction<T>): Promise<T> {
    await this.lockNext();
    try {
      return await promiseFn();
    } finally {
      this.locked = false;
      this.tryNext();
    }
  }

  private lockNext(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
      this.tryNext();
    });
  }

  private tryNext() {
    if (this.locked) {
      return;
    }
    const next = this.queue.shift();
    if (next) {
      this.locked = true;
      next();
    }
  }
}
