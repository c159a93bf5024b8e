import {
  ColorimeterEvent, Command, DeviceSessionOptions, DisconnectReason, Disposable, SessionOutcome, SessionPhase
} from '../types';
import { BleCentral, BleCharacteristic, BleDevice } from '../transport/BleCentral';
import { AsyncQueue } from '../utils/AsyncQueue';
import { hex } from '../utils/codec';
import { dbg, dbgV, logInfo, logWarn } from '../utils/debug';
import { CharacteristicMissingError, TransportError, errorMessage, withTimeout } from '../utils/errors';
import { startTimer } from '../utils/timers';
import { Gatt, decodeNotification, encodeCommand, framesForCommand, normalizeUuid } from './ColorPackets';
import { CommandQueue } from './CommandQueue';
import { BusMessage, BusSubscription, EventBus } from './EventBus';

type Wake =
  | { source: 'notification'; frame: Buffer | undefined }
  | { source: 'bus'; msg: BusMessage<ColorimeterEvent> }
  | { source: 'idle' }
  | { source: 'setup' }
  | { source: 'setupFailed'; error: unknown }
  | { source: 'linkDown' };

/**
 * One connection attempt against the colorimeter, from discovery to termination.
 *
 * The session subscribes to the bus on construction, so events published right
 * after it is created (such as replayed commands) are not missed.
 */
export class DeviceSession {
  private currentPhase = SessionPhase.CONNECTING;
  private readonly sub: BusSubscription<ColorimeterEvent>;
  private readonly notifications = new AsyncQueue<Buffer>();
  private readonly queue: CommandQueue;
  private readonly now: () => number;

  private device?: BleDevice;
  private writeChr?: BleCharacteristic;
  private notifyChr?: BleCharacteristic;
  private disposables: Disposable[] = [];
  private linkOpened = false;

  private busNext?: Promise<BusMessage<ColorimeterEvent>>;
  private stashed: ColorimeterEvent[] = [];
  private aborting = false;
  private signalLinkDown: () => void = () => undefined;
  private readonly linkDown = new Promise<void>(resolve => { this.signalLinkDown = resolve; });
  private started = false;
  private cleanedUp = false;

  private resultCount = 0;
  private lastScanFrame?: Buffer;
  private lastScanAt = 0;
  private lastNotificationAt = 0;

  constructor(
    private readonly central: BleCentral,
    private readonly bus: EventBus<ColorimeterEvent>,
    private readonly options: DeviceSessionOptions
  ) {
    this.sub = bus.subscribe();
    this.now = options.now ?? Date.now;
    this.queue = new CommandQueue(frame => this.writeFrame(frame));
  }

  get phase(): SessionPhase { return this.currentPhase; }
  /** Index of the last published scan result */
  get resultIndex(): number { return this.resultCount; }
  get pendingFrames(): number { return this.queue.pending; }

  /**
   * Run the session to completion. Never rejects: failures are published as
   * `error` events and reported through the outcome.
   */
  async run(): Promise<SessionOutcome> {
    if (this.started) throw new Error('DeviceSession.run() may only be called once');
    this.started = true;
    dbg('starting device session');
    try {
      const early = await this.establish();
      if (early) return early;
      return await this.readyLoop();
    } catch (err) {
      return this.fail(err);
    }
  }

  // ============================================================================
  // State Machine Management
  // ============================================================================

  private transitionTo(next: SessionPhase, reason: string) {
    const prev = this.currentPhase;
    if (prev === next) return;
    dbg(`Session transition: ${prev} → ${next} (${reason})`);
    this.currentPhase = next;
  }

  private publish(event: ColorimeterEvent) {
    this.bus.publish(event);
  }

  // ============================================================================
  // Setup
  // ============================================================================

  /**
   * Run setup while watching the bus; `exit` and `disconnect` abort it
   * @returns an outcome when setup was aborted
   */
  private async establish(): Promise<SessionOutcome | undefined> {
    const setup = this.setup();
    const setupDone = setup.then(
      (): Wake => ({ source: 'setup' }),
      (error: unknown): Wake => ({ source: 'setupFailed', error })
    );
    let busMsg = this.sub.recv();

    for (;;) {
      const wake = await Promise.race([
        setupDone,
        busMsg.then((msg): Wake => ({ source: 'bus', msg })),
        this.linkDown.then((): Wake => ({ source: 'linkDown' }))
      ]);
      if (wake.source === 'setupFailed') throw wake.error;
      if (wake.source === 'linkDown') {
        this.aborting = true;
        throw new TransportError('Device disconnected during setup');
      }
      if (wake.source !== 'bus') {
        this.busNext = busMsg;
        return undefined;
      }
      busMsg = this.sub.recv();

      const msg = wake.msg;
      if (msg.kind === 'lagged') {
        logWarn(`session missed ${msg.missed} bus events while connecting`);
        continue;
      }
      const ev: ColorimeterEvent = msg.kind === 'closed' ? { type: 'exit' } : msg.event;
      const userDisconnect = ev.type === 'command' && ev.command.type === 'disconnect';
      if (ev.type === 'exit' || userDisconnect) {
        dbg(`aborting session setup on ${userDisconnect ? 'disconnect' : 'exit'}`);
        this.aborting = true;
        // setup may be stuck in a device call; it finishes on its own and sees `aborting`
        setup.catch((err: unknown) => dbg(`abandoned setup failed: ${errorMessage(err)}`));
        return userDisconnect ? this.userDisconnect() : this.shutdown();
      }
      if (ev.type === 'command' || ev.type === 'command_queue') {
        this.stashed.push(ev);
      }
    }
  }

  private async setup(): Promise<void> {
    this.publish({ type: 'connecting' });

    const device = await withTimeout(
      this.central.findDevice({
        address: this.options.address,
        requiredServices: [Gatt.WRITE_SERVICE, Gatt.NOTIFY_SERVICE]
      }, this.options.findTimeout),
      // the central should honor the timeout itself; this is the outer bound
      this.options.findTimeout + 1000,
      'Device discovery'
    );
    if (!device) throw new TransportError('No device found');
    this.device = device;
    if (!this.options.address) logInfo(`Selected device: ${device.address} (${device.name ?? 'unnamed'})`);
    if (this.aborting) return;

    this.linkOpened = true;
    this.disposables.push(device.onDisconnect(() => {
      dbg('device link dropped');
      this.notifications.close();
      this.signalLinkDown();
    }));
    if (!device.isConnected()) {
      this.publish({ type: 'connecting', address: device.address, name: device.name });
      logInfo('Connecting');
      await withTimeout(device.connect(), this.options.connectTimeout, 'Connecting');
      if (this.aborting) return this.releaseLateLink(device);
    }
    this.publish({ type: 'connected', address: device.address, name: device.name });
    this.transitionTo(SessionPhase.CONNECTED, device.address);

    const chars = await withTimeout(
      device.discoverCharacteristics(), this.options.connectTimeout, 'Service discovery'
    );
    if (this.aborting) return;
    this.transitionTo(SessionPhase.SERVICES_DISCOVERED, `${chars.length} characteristics`);
    const find = (uuid: string) => chars.find(c => normalizeUuid(c.uuid) === normalizeUuid(uuid));

    const notifyChr = find(Gatt.NOTIFY_CHARACTERISTIC);
    if (!notifyChr) throw new CharacteristicMissingError(Gatt.NOTIFY_CHARACTERISTIC, this.currentPhase);
    const writeChr = find(Gatt.WRITE_CHARACTERISTIC);
    if (!writeChr) throw new CharacteristicMissingError(Gatt.WRITE_CHARACTERISTIC, this.currentPhase);

    this.disposables.push(notifyChr.onData(data => this.notifications.push(data)));
    this.notifyChr = notifyChr;
    await withTimeout(notifyChr.subscribe(), this.options.connectTimeout, 'Subscribing');
    if (this.aborting) return;
    this.transitionTo(SessionPhase.SUBSCRIBED, 'notifications enabled');
    this.writeChr = writeChr;
  }

  // ============================================================================
  // Ready loop
  // ============================================================================

  private async readyLoop(): Promise<SessionOutcome> {
    this.transitionTo(SessionPhase.READY, 'setup complete');
    this.lastNotificationAt = this.now();

    for (const ev of this.stashed.splice(0)) {
      const outcome = await this.handleBusEvent(ev);
      if (outcome) return outcome;
    }

    let notif = this.notifications.next();
    let busMsg = this.busNext ?? this.sub.recv();

    for (;;) {
      const idleFor = this.now() - this.lastNotificationAt;
      const timer = startTimer(this.options.keepaliveInterval - idleFor);
      let wake: Wake;
      try {
        wake = await Promise.race([
          notif.then((frame): Wake => ({ source: 'notification', frame })),
          busMsg.then((msg): Wake => ({ source: 'bus', msg })),
          timer.promise.then((): Wake => ({ source: 'idle' }))
        ]);
      } finally {
        timer.cancel();
      }

      switch (wake.source) {
        case 'notification':
          if (wake.frame === undefined) return this.linkLost();
          notif = this.notifications.next();
          await this.handleNotification(wake.frame);
          break;
        case 'bus': {
          busMsg = this.sub.recv();
          const outcome = await this.handleBusMessage(wake.msg);
          if (outcome) return outcome;
          break;
        }
        case 'idle':
          dbg('keepalive: requesting battery level');
          this.lastNotificationAt = this.now();
          await this.queue.enqueue(encodeCommand('BATTERY'));
          break;
        default:
          break;
      }
    }
  }

  private async handleNotification(frame: Buffer) {
    const at = this.now();
    this.lastNotificationAt = at;
    dbg(`Received: ${hex(frame)}`);

    const decoded = decodeNotification(frame);
    switch (decoded.kind) {
      case 'scan':
        if (this.lastScanFrame && frame.equals(this.lastScanFrame) && at - this.lastScanAt < this.options.duplicateWindow) {
          logWarn(`Duplicated result, dropping: ${hex(frame)}`);
          break;
        }
        this.resultCount++;
        this.lastScanFrame = Buffer.from(frame);
        this.lastScanAt = at;
        this.publish({ type: 'scan', result: { index: this.resultCount, ...decoded.reading } });
        break;
      case 'calibrated':
        dbgV('calibration response');
        this.publish({ type: 'calibrated' });
        break;
      case 'power_level':
        this.publish({ type: 'power_level', value: decoded.value });
        break;
      case 'device_info':
        this.publish({ type: 'device_info', values: decoded.values });
        break;
      case 'unrecognized':
        logWarn(`Unknown message (${decoded.reason}): ${hex(frame)}`);
        break;
    }

    await this.queue.onNotificationProcessed();
  }

  private async handleBusMessage(msg: BusMessage<ColorimeterEvent>): Promise<SessionOutcome | undefined> {
    switch (msg.kind) {
      case 'lagged':
        logWarn(`session missed ${msg.missed} bus events`);
        return undefined;
      case 'closed':
        return this.shutdown();
      case 'event':
        return this.handleBusEvent(msg.event);
    }
  }

  private async handleBusEvent(ev: ColorimeterEvent): Promise<SessionOutcome | undefined> {
    switch (ev.type) {
      case 'exit':
        return this.shutdown();
      case 'command':
        if (ev.command.type === 'disconnect') return this.userDisconnect();
        await this.handleCommand(ev.command);
        return undefined;
      case 'command_queue':
        for (const cmd of ev.commands) await this.handleCommand(cmd);
        return undefined;
      default:
        return undefined;
    }
  }

  private async handleCommand(cmd: Command) {
    const frames = framesForCommand(cmd);
    if (frames.length === 0) {
      dbgV(`session ignores command ${cmd.type}`);
      return;
    }
    for (const frame of frames) await this.queue.enqueue(frame);
  }

  private async writeFrame(frame: Buffer) {
    const chr = this.writeChr;
    if (!chr) throw new TransportError('Write characteristic not available');
    try {
      await chr.write(frame, true);
    } catch (err) {
      throw new TransportError(`Write failed: ${errorMessage(err)}`, { frame: hex(frame) });
    }
  }

  // ============================================================================
  // Termination
  // ============================================================================

  private async shutdown(): Promise<SessionOutcome> {
    dbg('exiting device session');
    const disconnected = await this.cleanup();
    if (disconnected) this.publish({ type: 'disconnected' });
    this.transitionTo(SessionPhase.EXITED, 'exit');
    return { kind: 'exited' };
  }

  private async userDisconnect(): Promise<SessionOutcome> {
    dbg('disconnecting device session');
    await this.cleanup();
    this.publish({ type: 'disconnected' });
    this.transitionTo(SessionPhase.DISCONNECTED, 'disconnect command');
    return { kind: 'disconnected', reason: DisconnectReason.USER_REQUEST };
  }

  private async linkLost(): Promise<SessionOutcome> {
    logInfo('Device disconnected');
    this.publish({ type: 'disconnected' });
    await this.cleanup();
    this.transitionTo(SessionPhase.DISCONNECTED, 'notification stream ended');
    return { kind: 'disconnected', reason: DisconnectReason.LINK_LOST };
  }

  private async fail(err: unknown): Promise<SessionOutcome> {
    const error = err instanceof Error ? err : new Error(String(err));
    logWarn(`session failed: ${error.message}`);
    await this.cleanup();
    this.publish({ type: 'error', message: error.message });
    this.transitionTo(SessionPhase.ERRORED, error.name);
    return { kind: 'errored', error };
  }

  /**
   * Best-effort teardown: unsubscribe, disconnect, drop queued frames
   * @returns true when the device acknowledged the disconnect
   */
  /** A connect that completed after cleanup already ran leaves the link open */
  private async releaseLateLink(device: BleDevice): Promise<void> {
    if (!this.cleanedUp || !device.isConnected()) return;
    try {
      await device.disconnect();
    } catch (err) {
      logWarn(`disconnect failed: ${errorMessage(err)}`);
    }
  }

  private async cleanup(): Promise<boolean> {
    if (this.cleanedUp) return false;
    this.cleanedUp = true;

    const dropped = this.queue.clear();
    if (dropped > 0) dbg(`discarding ${dropped} unsent command frame(s)`);
    for (const d of this.disposables.splice(0)) d.dispose();
    this.notifications.close();
    this.sub.close();
    this.writeChr = undefined;

    if (this.notifyChr) {
      try {
        await this.notifyChr.unsubscribe();
      } catch (err) {
        logWarn(`unsubscribe failed: ${errorMessage(err)}`);
      }
    }
    if (!this.device || !this.linkOpened) return false;
    try {
      await this.device.disconnect();
      return true;
    } catch (err) {
      logWarn(`disconnect failed: ${errorMessage(err)}`);
      return false;
    }
  }
}
