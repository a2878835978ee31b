/**
 * Single-consumer async queue.
 *
 * Producers `push()` without waiting; the consumer awaits `next()`, which
 * resolves with `null` once the channel is closed and drained. Closing with
 * an error makes every pending and later `next()` reject with it instead.
 */
export class Channel<T> {
  private readonly queue: T[] = [];
  private waiters: Array<{
    resolve: (value: T | null) => void;
    reject: (error: Error) => void;
  }> = [];
  private closed = false;
  private error?: Error;

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(value);
    } else {
      this.queue.push(value);
    }
  }

  close(error?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.error = error;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (error) {
        waiter.reject(error);
      } else {
        waiter.resolve(null);
      }
    }
  }

  next(): Promise<T | null> {
    if (this.queue.length > 0) {
      const value = this.queue.shift();
      if (value !== undefined) return Promise.resolve(value);
    }
    if (this.closed) {
      return this.error ? Promise.reject(this.error) : Promise.resolve(null);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const value = await this.next();
      if (value === null) return;
      yield value;
    }
  }
}
