import {
  ColorimeterEvent, Command, DeviceCommand, DeviceState, DisconnectReason, SessionOutcome,
  SupervisorOptions, SupervisorStopReason, isDeviceCommand
} from '../types';
import { dbg, logInfo, logWarn } from '../utils/debug';
import { getDisconnectMessage } from '../utils/errors';
import { startTimer } from '../utils/timers';
import { createDeviceState, foldDeviceState } from './DeviceState';
import { BusMessage, BusSubscription, EventBus } from './EventBus';

export interface SessionRunner {
  run(): Promise<SessionOutcome>;
}

/** Creates a session; called once per connection attempt */
export type SessionFactory = () => SessionRunner;

type Wake =
  | { source: 'bus' }
  | { source: 'session'; outcome: SessionOutcome }
  | { source: 'backoff' };

/**
 * Owns the retry policy: starts device sessions, applies backoff and attempt
 * limits, and queues device commands issued while no session is running.
 */
export class Supervisor {
  private attemptCount = 0;
  private wantRetry = true;
  private pending: DeviceCommand[];
  private state: DeviceState = createDeviceState();
  private sessionActive = false;
  private stopReason?: SupervisorStopReason;
  private exitRequested = false;
  private started = false;
  private busClosed = false;
  private readonly sub: BusSubscription<ColorimeterEvent>;

  constructor(
    private readonly bus: EventBus<ColorimeterEvent>,
    private readonly createSession: SessionFactory,
    private readonly options: SupervisorOptions
  ) {
    this.pending = [...(options.initialCommands ?? [])];
    this.sub = bus.subscribe();
  }

  get attempts(): number { return this.attemptCount; }
  get retrying(): boolean { return this.wantRetry; }
  get pendingCommands(): readonly Command[] { return this.pending; }
  get isSessionActive(): boolean { return this.sessionActive; }
  getState(): DeviceState { return this.state; }

  /**
   * Run until `exit`, or until a clean disconnect when not configured to remain
   */
  async run(): Promise<SupervisorStopReason> {
    if (this.started) throw new Error('Supervisor.run() may only be called once');
    this.started = true;

    let busReady = this.nextBusReady();
    let session: Promise<SessionOutcome> | undefined;

    try {
      while (!this.stopReason) {
        if (!session && this.wantRetry) {
          if (this.attemptCount > 0) {
            // interruptible backoff: bus traffic keeps being handled while waiting
            const backoff = startTimer(this.options.retryInterval);
            dbg(`retrying in ${this.options.retryInterval}ms (attempt ${this.attemptCount + 1})`);
            let waited = false;
            while (!waited && !this.stopReason) {
              const wake = await Promise.race([
                backoff.promise.then((): Wake => ({ source: 'backoff' })),
                busReady.then((): Wake => ({ source: 'bus' }))
              ]);
              if (wake.source === 'bus') {
                this.handleBuffered();
                busReady = this.nextBusReady();
                if (this.attemptCount === 0) waited = true;
              } else {
                waited = true;
              }
            }
            backoff.cancel();
            if (this.stopReason || !this.wantRetry) continue;
          }
          session = this.startSession();
        }

        const waits: Promise<Wake>[] = [busReady.then((): Wake => ({ source: 'bus' }))];
        if (session) waits.push(session.then((outcome): Wake => ({ source: 'session', outcome })));
        const wake = await Promise.race(waits);

        if (wake.source === 'bus') {
          this.handleBuffered();
          busReady = this.nextBusReady();
        } else if (wake.source === 'session') {
          session = undefined;
          this.sessionActive = false;
          // everything buffered so far was published while that session ran
          this.drainSessionEvents();
          this.handleOutcome(wake.outcome);
        }
      }
    } finally {
      this.sub.close();
    }
    const reason = this.stopReason ?? 'exit';
    dbg(`supervisor stopped (${reason})`);
    return reason;
  }

  private nextBusReady(): Promise<void> {
    // a closed subscription is always readable
    if (this.busClosed) return new Promise(() => undefined);
    return this.sub.readable();
  }

  private handleBuffered() {
    for (let msg = this.sub.tryRecv(); msg; msg = this.sub.tryRecv()) {
      this.handleBusMessage(msg);
      if (msg.kind === 'closed') return;
    }
  }

  private startSession(): Promise<SessionOutcome> {
    this.attemptCount++;
    dbg(`starting session, attempt ${this.attemptCount}`);
    const runner = this.createSession();
    this.sessionActive = true;
    const outcome = runner.run();
    if (this.pending.length > 0) {
      this.bus.publish({ type: 'command_queue', commands: [...this.pending] });
    }
    return outcome;
  }

  private drainSessionEvents() {
    for (let msg = this.sub.tryRecv(); msg; msg = this.sub.tryRecv()) {
      if (msg.kind === 'closed') {
        this.busClosed = true;
        this.exitRequested = true;
        return;
      }
      if (msg.kind === 'event') {
        this.state = foldDeviceState(this.state, msg.event);
        if (msg.event.type === 'exit') this.exitRequested = true;
      }
    }
  }

  private handleOutcome(outcome: SessionOutcome) {
    if (this.exitRequested) {
      this.stop('exit');
      return;
    }
    switch (outcome.kind) {
      case 'exited':
        this.stop('exit');
        break;
      case 'disconnected':
        logInfo(getDisconnectMessage(outcome.reason));
        this.attemptCount = 0;
        this.pending = [];
        if (outcome.reason === DisconnectReason.USER_REQUEST) {
          this.wantRetry = false;
        } else if (this.options.remain) {
          this.wantRetry = true;
        } else {
          this.stop('disconnected');
        }
        break;
      case 'errored':
        this.pending = [];
        this.wantRetry = this.options.remain && this.attemptCount < this.options.maxAttempts;
        if (!this.wantRetry) {
          logWarn(`giving up after ${this.attemptCount} attempt(s): ${outcome.error.message}`);
        }
        break;
    }
    if (!this.wantRetry && this.options.stopWhenIdle) this.stop('idle');
  }

  private handleBusMessage(msg: BusMessage<ColorimeterEvent>) {
    switch (msg.kind) {
      case 'lagged':
        logWarn(`supervisor missed ${msg.missed} bus events`);
        return;
      case 'closed':
        this.busClosed = true;
        this.requestExit();
        return;
      case 'event':
        this.state = foldDeviceState(this.state, msg.event);
        if (msg.event.type === 'exit') {
          this.requestExit();
          return;
        }
        if (!this.sessionActive && msg.event.type === 'command') this.handleIdleCommand(msg.event.command);
        return;
    }
  }

  private handleIdleCommand(cmd: Command) {
    if (cmd.type === 'reconnect') {
      dbg('reconnect requested');
      this.attemptCount = 0;
      this.wantRetry = true;
    } else if (isDeviceCommand(cmd)) {
      dbg(`queueing ${cmd.type} until connected`);
      this.wantRetry = true;
      this.pending.push(cmd);
    } else {
      this.bus.publish({ type: 'error', message: 'Device is disconnected' });
    }
  }

  // a running session observes exit itself; the loop stops once it has cleaned up
  private requestExit() {
    this.exitRequested = true;
    if (!this.sessionActive) this.stop('exit');
  }

  private stop(reason: SupervisorStopReason) {
    if (!this.stopReason) this.stopReason = reason;
  }
}
