import { dbgV } from '../utils/debug';

export const DEFAULT_BUS_CAPACITY = 32;

export type BusMessage<T> =
  | { kind: 'event'; event: T }
  /** Events were dropped because this subscriber fell behind */
  | { kind: 'lagged'; missed: number }
  | { kind: 'closed' };

/**
 * Publish/subscribe channel with a bounded buffer per subscriber.
 *
 * Publishing never waits for consumers. A subscriber whose buffer is full loses
 * its oldest events and is told how many it missed on its next `recv()`.
 */
export class EventBus<T> {
  private subscribers = new Set<BusSubscription<T>>();
  private closed = false;

  constructor(public readonly capacity = DEFAULT_BUS_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Bus capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * @returns number of subscribers the event was delivered to
   */
  publish(event: T): number {
    if (this.closed) return 0;
    for (const sub of this.subscribers) sub.push(event);
    return this.subscribers.size;
  }

  subscribe(): BusSubscription<T> {
    const sub = new BusSubscription<T>(this.capacity, () => this.subscribers.delete(sub));
    if (this.closed) sub.close();
    else this.subscribers.add(sub);
    return sub;
  }

  get subscriberCount(): number { return this.subscribers.size; }
  get isClosed(): boolean { return this.closed; }

  close() {
    if (this.closed) return;
    this.closed = true;
    for (const sub of [...this.subscribers]) sub.close();
    this.subscribers.clear();
  }
}

export class BusSubscription<T> {
  private buffer: T[] = [];
  private missed = 0;
  private closed = false;
  private waiter?: (msg: BusMessage<T>) => void;
  private readers: Array<() => void> = [];

  /** @internal */
  constructor(private readonly capacity: number, private readonly detach: () => void) {}

  /** @internal */
  push(event: T) {
    if (this.closed) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ kind: 'event', event });
      return;
    }
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.missed++;
      dbgV(`bus subscriber lagging, missed=${this.missed}`);
    }
    this.buffer.push(event);
    this.wakeReaders();
  }

  /**
   * Next message without waiting, or undefined when nothing is buffered
   */
  tryRecv(): BusMessage<T> | undefined {
    if (this.missed > 0) {
      const missed = this.missed;
      this.missed = 0;
      return { kind: 'lagged', missed };
    }
    const event = this.buffer.shift();
    if (event !== undefined) return { kind: 'event', event };
    if (this.closed) return { kind: 'closed' };
    return undefined;
  }

  /**
   * Wait for the next message. Only one `recv()` may be pending at a time.
   */
  recv(): Promise<BusMessage<T>> {
    const ready = this.tryRecv();
    if (ready) return Promise.resolve(ready);
    if (this.waiter) {
      return Promise.reject(new Error('Concurrent recv() on one bus subscription'));
    }
    return new Promise(resolve => { this.waiter = resolve; });
  }

  /**
   * Resolves once `tryRecv()` has something to return, without consuming it
   */
  readable(): Promise<void> {
    if (this.missed > 0 || this.buffer.length > 0 || this.closed) return Promise.resolve();
    return new Promise(resolve => { this.readers.push(resolve); });
  }

  get pending(): number { return this.buffer.length; }
  get isClosed(): boolean { return this.closed; }

  /**
   * Stop receiving; buffered events stay readable, a pending `recv()` resolves as closed
   */
  close() {
    if (this.closed) return;
    this.closed = true;
    this.detach();
    const waiter = this.waiter;
    this.waiter = undefined;
    if (waiter) waiter({ kind: 'closed' });
    this.wakeReaders();
  }

  private wakeReaders() {
    for (const wake of this.readers.splice(0)) wake();
  }
}
