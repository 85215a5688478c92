type Waiter<T> = (item: T | undefined) => void;

/**
 * Unbounded multi-producer, single-consumer queue. `take` suspends until an
 * item arrives, the optional timeout elapses, the queue is woken, or it is
 * closed; the last three resolve to `undefined`.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    this.items.push(item);
    return true;
  }

  take(timeoutMs?: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const waiter: Waiter<T> = (item) => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(item);
      };

      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          resolve(undefined);
        }, timeoutMs);
      }
    });
  }

  /** Releases every suspended `take` with `undefined` without closing. */
  wake(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  close(): void {
    this.closed = true;
    this.wake();
  }
}
