import readline from 'readline';
import { ColorimeterEvent } from '../types';
import { EventBus } from '../core/EventBus';
import { OutputPrinter } from '../output/printers';
import { dbg, logWarn } from '../utils/debug';
import { parseConsoleLine } from './parseCommand';

export interface ConsoleOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  prompt?: string;
}

/**
 * Line-editing console: typed commands go onto the bus, formatted events are
 * printed above the prompt. EOF and Ctrl-C publish `exit`.
 */
export class InteractiveConsole {
  private readonly output: NodeJS.WritableStream;
  private rl?: readline.Interface;
  private exiting = false;

  constructor(
    private readonly bus: EventBus<ColorimeterEvent>,
    private readonly printer: OutputPrinter,
    private readonly options: ConsoleOptions = {}
  ) {
    this.output = options.output ?? process.stdout;
  }

  async run(): Promise<void> {
    const sub = this.bus.subscribe();
    const rl = readline.createInterface({
      input: this.options.input ?? process.stdin,
      output: this.output,
      prompt: this.options.prompt ?? '> ',
      historySize: 100
    });
    this.rl = rl;

    rl.on('line', line => {
      const ev = parseConsoleLine(line);
      if (ev) {
        dbg(`console command: ${line.trim()}`);
        if (ev.type === 'exit') this.exiting = true;
        this.bus.publish(ev);
      }
      if (!this.exiting) rl.prompt();
    });
    rl.on('SIGINT', () => rl.close());
    rl.on('close', () => {
      if (this.exiting) return;
      this.exiting = true;
      this.bus.publish({ type: 'exit' });
    });
    rl.prompt();

    try {
      for (;;) {
        const msg = await sub.recv();
        if (msg.kind === 'closed') break;
        if (msg.kind === 'lagged') {
          logWarn(`console fell behind, ${msg.missed} events skipped`);
          continue;
        }
        if (msg.event.type === 'exit') break;
        const text = this.printer.formatEvent(msg.event);
        if (text !== undefined) this.print(text);
      }
    } finally {
      sub.close();
      this.exiting = true;
      rl.close();
    }
  }

  private print(text: string) {
    const rl = this.rl;
    readline.clearLine(this.output, 0);
    readline.cursorTo(this.output, 0);
    this.output.write(text + '\n');
    if (rl && !this.exiting) rl.prompt(true);
  }
}
