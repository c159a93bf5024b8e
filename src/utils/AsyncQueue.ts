/**
 * Unbounded single-consumer queue bridging callback producers to an async reader.
 * `next()` resolves with undefined once the queue is closed and drained.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private closed = false;
  private waiter?: (item: T | undefined) => void;

  push(item: T) {
    if (this.closed) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  next(): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise(resolve => { this.waiter = resolve; });
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    if (waiter) waiter(undefined);
  }

  get isClosed(): boolean { return this.closed; }
  get size(): number { return this.items.length; }
}
