import { WebSocket, WebSocketServer, RawData } from 'ws';
import { z } from 'zod';
import { ColorimeterEvent, DeviceState, ListenAddress } from '../types';
import { EventBus, BusSubscription } from '../core/EventBus';
import { createDeviceState, foldDeviceState } from '../core/DeviceState';
import { JsonPrinter, JsonValue } from '../output/printers';
import { eventForCommandName } from '../console/parseCommand';
import { TransportError, errorMessage } from '../utils/errors';
import { dbg, logInfo, logWarn } from '../utils/debug';

// Inbound frames are `[name, ...args]`; arguments are currently ignored
const ClientMessageSchema = z.tuple([z.string()]).rest(z.unknown());

const INVALID_MESSAGE: JsonValue[] = ['error', 'invalid message'];
const INVALID_COMMAND: JsonValue[] = ['error', 'invalid command'];

export type ClientMessageResult =
  | { ok: true; event: ColorimeterEvent }
  | { ok: false; reply: JsonValue[] };

export function parseClientMessage(text: string): ClientMessageResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, reply: INVALID_MESSAGE };
  }
  const parsed = ClientMessageSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, reply: INVALID_MESSAGE };
  const event = eventForCommandName(parsed.data[0]);
  if (!event) return { ok: false, reply: INVALID_COMMAND };
  return { ok: true, event };
}

/**
 * Snapshot sent to every client when it connects
 */
export function stateMessage(state: DeviceState): JsonValue[] {
  return ['state', {
    connected: state.connected,
    connecting: state.connecting,
    device_address: state.deviceAddress ?? null,
    device_name: state.deviceName ?? null,
    power_level: state.powerLevel ?? null,
    calibrated: state.calibratedAt ? state.calibratedAt.toISOString() : null
  }];
}

function rawToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * WebSocket broadcaster: forwards every bus event as JSON to all clients and
 * publishes the commands they send.
 */
export class BroadcastServer {
  private server: WebSocketServer | null = null;
  private clients = new Set<WebSocket>();
  private state: DeviceState = createDeviceState();
  private readonly printer = new JsonPrinter();
  private readonly sub: BusSubscription<ColorimeterEvent>;

  constructor(
    private readonly bus: EventBus<ColorimeterEvent>,
    private readonly listen: ListenAddress
  ) {
    // subscribe now so the state snapshot covers events published before listening
    this.sub = bus.subscribe();
  }

  get clientCount(): number { return this.clients.size; }

  /** Bound port once listening; differs from the configured one when that is 0 */
  get port(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  async run(): Promise<void> {
    try {
      await this.startServer();
      for (;;) {
        const msg = await this.sub.recv();
        if (msg.kind === 'closed') break;
        if (msg.kind === 'lagged') {
          logWarn(`broadcaster fell behind, ${msg.missed} events skipped`);
          continue;
        }
        this.state = foldDeviceState(this.state, msg.event);
        const json = this.printer.formatEventJson(msg.event);
        if (json) this.broadcast(json);
        if (msg.event.type === 'exit') break;
      }
    } finally {
      this.sub.close();
      await this.close();
    }
  }

  private startServer(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host: this.listen.host, port: this.listen.port });
      const onError = (err: Error) => {
        reject(new TransportError(`Cannot listen on ${this.listen.host}:${this.listen.port}: ${err.message}`));
      };
      server.once('error', onError);
      server.once('listening', () => {
        server.off('error', onError);
        server.on('error', err => logWarn('WebSocket server error:', err.message));
        logInfo(`Listening on ws://${this.listen.host}:${this.port ?? this.listen.port}`);
        resolve();
      });
      server.on('connection', ws => this.handleConnection(ws));
      this.server = server;
    });
  }

  private handleConnection(ws: WebSocket) {
    this.clients.add(ws);
    dbg(`client connected (${this.clients.size} total)`);
    this.send(ws, stateMessage(this.state));

    ws.on('message', (data, isBinary) => {
      const result: ClientMessageResult = isBinary
        ? { ok: false, reply: INVALID_MESSAGE }
        : parseClientMessage(rawToText(data));
      if (result.ok) {
        dbg('client command:', result.event);
        this.bus.publish(result.event);
      } else {
        this.send(ws, result.reply);
      }
    });
    ws.on('close', () => {
      this.clients.delete(ws);
      dbg(`client disconnected (${this.clients.size} left)`);
    });
    ws.on('error', err => {
      logWarn('WebSocket client error:', err.message);
      this.clients.delete(ws);
    });
  }

  private broadcast(message: JsonValue[]) {
    const data = JSON.stringify(message);
    this.clients.forEach(client => this.send(client, data));
  }

  private send(client: WebSocket, message: JsonValue[] | string) {
    if (client.readyState !== WebSocket.OPEN) {
      this.clients.delete(client);
      return;
    }
    const data = typeof message === 'string' ? message : JSON.stringify(message);
    client.send(data, err => {
      if (err) {
        logWarn('Failed to send to client:', err.message);
        this.clients.delete(client);
      }
    });
  }

  private close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    this.clients.forEach(client => client.close());
    this.clients.clear();
    return new Promise(resolve => {
      server.close(err => {
        if (err) logWarn('WebSocket server close failed:', errorMessage(err));
        resolve();
      });
    });
  }
}
