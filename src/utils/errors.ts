import { DisconnectReason, SessionPhase } from '../types';

/**
 * Failure categories surfaced by the session engine
 */
export enum ErrorKind {
  /** Link write/read failure, connect failure, discovery timeout */
  TRANSPORT = 'transport',
  /** Malformed or unrecognized frame */
  PROTOCOL = 'protocol',
  /** Required characteristic missing on the device */
  COMMAND_TARGET = 'command_target',
  /** Unparseable console or network command */
  USER_INPUT = 'user_input'
}

/**
 * Get human-readable message for a disconnect reason
 */
export function getDisconnectMessage(reason: DisconnectReason): string {
  switch (reason) {
    case DisconnectReason.USER_REQUEST:
      return 'Disconnected by user request';
    case DisconnectReason.LINK_LOST:
      return 'Device link lost';
    case DisconnectReason.EXIT:
      return 'Disconnected on exit';
    default:
      return 'Disconnected';
  }
}

export class ColorimeterError extends Error {
  public readonly name: string = 'ColorimeterError';

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      context: this.context
    };
  }
}

export class TransportError extends ColorimeterError {
  public readonly name: string = 'TransportError';

  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorKind.TRANSPORT, message, context);
  }
}

export class TimeoutError extends TransportError {
  public readonly name: string = 'TimeoutError';

  constructor(operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
  }
}

/**
 * Thrown when the device does not expose the write or notify characteristic
 */
export class CharacteristicMissingError extends ColorimeterError {
  public readonly name: string = 'CharacteristicMissingError';

  constructor(public readonly uuid: string, public readonly phase: SessionPhase) {
    super(ErrorKind.COMMAND_TARGET, `No ${uuid} characteristic found`, { uuid, phase });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Race a promise against a timer; the timer is cleared once either settles
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
