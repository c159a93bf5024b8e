import { dbg, dbgV } from '../utils/debug';
import { hex } from '../utils/codec';

export type FrameWriter = (frame: Buffer) => Promise<void>;

/**
 * Outbound frame queue for a device that tolerates one unacknowledged command.
 *
 * The queue and the awaiting-reply flag are only mutated in the synchronous part
 * of each method, before the write is awaited, so callers interleaving on the
 * event loop always see them consistent.
 */
export class CommandQueue {
  private queue: Buffer[] = [];
  private awaitingReply = false;
  private written = 0;

  constructor(private readonly write: FrameWriter) {}

  async enqueue(frame: Buffer): Promise<void> {
    if (this.queue.length === 0 && !this.awaitingReply) {
      this.awaitingReply = true;
      dbg(`write immediate command: ${hex(frame)}`);
      await this.send(frame);
    } else {
      this.queue.push(frame);
      dbgV(`queued command (${this.queue.length} pending): ${hex(frame)}`);
    }
  }

  /**
   * Call once an inbound notification has been fully handled
   */
  async onNotificationProcessed(): Promise<void> {
    const next = this.queue.shift();
    if (!next) {
      this.awaitingReply = false;
      return;
    }
    dbg(`write queued command: ${hex(next)}`);
    await this.send(next);
  }

  /**
   * Discard unsent frames
   * @returns number of frames discarded
   */
  clear(): number {
    const n = this.queue.length;
    this.queue = [];
    this.awaitingReply = false;
    return n;
  }

  get pending(): number { return this.queue.length; }
  get isAwaitingReply(): boolean { return this.awaitingReply; }
  get writeCount(): number { return this.written; }

  private async send(frame: Buffer) {
    this.written++;
    await this.write(frame);
  }
}
