import { ColorimeterEvent, ColorimeterEventType } from '../src/types';
import { BusSubscription } from '../src/core/EventBus';

/**
 * Collects bus events for assertions
 */
export class Recorder {
  readonly events: ColorimeterEvent[] = [];
  constructor(private readonly sub: BusSubscription<ColorimeterEvent>) {}

  async waitFor(type: ColorimeterEventType): Promise<ColorimeterEvent> {
    for (;;) {
      const msg = await this.sub.recv();
      if (msg.kind === 'closed') throw new Error(`bus closed while waiting for ${type}`);
      if (msg.kind === 'lagged') continue;
      this.events.push(msg.event);
      if (msg.event.type === type) return msg.event;
    }
  }

  /** Record whatever is already buffered */
  flush(): ColorimeterEvent[] {
    for (let msg = this.sub.tryRecv(); msg; msg = this.sub.tryRecv()) {
      if (msg.kind === 'event') this.events.push(msg.event);
    }
    return this.events;
  }

  types(): string[] { return this.flush().map(e => e.type); }
}

export async function until(cond: () => boolean, timeoutMs = 2000) {
  const start = Date.now();
  while (!cond()) {
    if (Date.now() - start > timeoutMs) throw new Error('condition not met in time');
    await new Promise(resolve => setTimeout(resolve, 1));
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => { resolve = r; });
  return { promise, resolve };
}
