import { ColorimeterEvent } from '../types';
import { EventBus } from '../core/EventBus';
import { dbg, dbgV, logWarn } from '../utils/debug';
import { OutputPrinter } from './printers';

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = line => { process.stdout.write(line + '\n'); };

/**
 * Print every formatted event until `exit`. Without a printer events are only traced.
 */
export async function runLogLoop(
  bus: EventBus<ColorimeterEvent>,
  printer?: OutputPrinter,
  write: LineWriter = stdoutWriter
): Promise<void> {
  const sub = bus.subscribe();
  try {
    for (;;) {
      const msg = await sub.recv();
      if (msg.kind === 'closed') break;
      if (msg.kind === 'lagged') {
        logWarn(`output fell behind, ${msg.missed} events skipped`);
        continue;
      }
      const event = msg.event;
      if (event.type === 'exit') break;
      dbgV('event:', event);
      const out = printer?.formatEvent(event);
      if (out !== undefined) write(out);
    }
  } finally {
    sub.close();
    dbg('log loop stopped');
  }
}
