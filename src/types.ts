export type Triple<T = number> = [T, T, T];

/**
 * One color measurement as reported by the device
 * Color-space values are passed through without interpretation
 */
export interface ScanReading {
  lab: Triple;
  luv: Triple;
  lch: Triple;
  yxy: Triple;
  /** 8-bit channel values */
  rgb: Triple;
}

export interface ScanResult extends ScanReading {
  /** 1-based, increasing within one session */
  index: number;
}

// ============================================================================
// Commands and Events
// ============================================================================

export type Command =
  | { type: 'scan' }
  | { type: 'calibrate' }
  | { type: 'status' }
  | { type: 'connect'; address: string }
  | { type: 'reconnect' }
  | { type: 'disconnect' };

/** Commands that the device can execute and the supervisor may queue while idle */
export type DeviceCommand = Extract<Command, { type: 'scan' | 'calibrate' | 'status' }>;

export function isDeviceCommand(cmd: Command): cmd is DeviceCommand {
  return cmd.type === 'scan' || cmd.type === 'calibrate' || cmd.type === 'status';
}

export type ColorimeterEvent =
  | { type: 'exit' }
  | { type: 'error'; message: string }
  | { type: 'scan'; result: ScanResult }
  | { type: 'connecting'; address?: string; name?: string }
  | { type: 'connected'; address: string; name?: string }
  | { type: 'disconnected' }
  | { type: 'power_level'; value: number }
  | { type: 'device_info'; values: number[] }
  | { type: 'calibrated' }
  | { type: 'command'; command: Command }
  | { type: 'command_queue'; commands: Command[] };

export type ColorimeterEventType = ColorimeterEvent['type'];

export interface Disposable {
  dispose(): void;
}

// ============================================================================
// Aggregated state
// ============================================================================

/**
 * Device state derived by folding bus events in arrival order
 */
export interface DeviceState {
  connected: boolean;
  connecting: boolean;
  deviceAddress?: string;
  deviceName?: string;
  powerLevel?: number;
  deviceInfoRaw?: number[];
  calibratedAt?: Date;
}

// ============================================================================
// Session lifecycle
// ============================================================================

/**
 * Device session state machine
 */
export enum SessionPhase {
  /** Discovering and connecting to the device */
  CONNECTING = 'CONNECTING',
  /** Link established */
  CONNECTED = 'CONNECTED',
  /** GATT characteristics enumerated */
  SERVICES_DISCOVERED = 'SERVICES_DISCOVERED',
  /** Notifications enabled */
  SUBSCRIBED = 'SUBSCRIBED',
  /** Processing notifications and commands */
  READY = 'READY',
  DISCONNECTED = 'DISCONNECTED',
  EXITED = 'EXITED',
  ERRORED = 'ERRORED'
}

/**
 * Reason for a clean session termination
 */
export enum DisconnectReason {
  /** A disconnect command was received */
  USER_REQUEST = 'user_request',
  /** The notification stream ended */
  LINK_LOST = 'link_lost',
  /** The process is shutting down */
  EXIT = 'exit'
}

export type SessionOutcome =
  | { kind: 'exited' }
  | { kind: 'disconnected'; reason: DisconnectReason.USER_REQUEST | DisconnectReason.LINK_LOST }
  | { kind: 'errored'; error: Error };

export interface DeviceSessionOptions {
  /** Only connect to the device with this address */
  address?: string;
  /** Discovery timeout (ms) */
  findTimeout: number;
  /** Connect timeout (ms) */
  connectTimeout: number;
  /** Idle time without notifications before a battery request is sent (ms) */
  keepaliveInterval: number;
  /** Identical scan frames closer together than this are retransmissions (ms) */
  duplicateWindow: number;
  /** Clock used for duplicate suppression and keepalive */
  now?: () => number;
}

export interface SupervisorOptions {
  /** Keep reconnecting after the link is lost or a session fails */
  remain: boolean;
  /** Give up after this many consecutive failed sessions */
  maxAttempts: number;
  /** Delay before each retry after the first attempt (ms) */
  retryInterval: number;
  /** Commands replayed into the first session */
  initialCommands?: DeviceCommand[];
  /** Stop once nothing is left to retry, for runs where no one can send a command */
  stopWhenIdle?: boolean;
}

export type SupervisorStopReason = 'exit' | 'disconnected' | 'idle';

export type OutputFormat = 'text' | 'json';

export interface ListenAddress {
  host: string;
  port: number;
}
