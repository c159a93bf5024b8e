/**
 * Process-level error handlers
 *
 * Installed by the CLI so that a stray rejection from the Bluetooth stack is
 * logged instead of terminating a long-running `--remain` session.
 *
 * ```typescript
 * import { setupGlobalErrorHandlers } from './utils/errorHandling';
 *
 * const remove = setupGlobalErrorHandlers({
 *   onUncaughtException: (error) => logError('fatal:', error.message)
 * });
 * ```
 */

import { ColorimeterError, ErrorKind } from './errors';
import { dbg, logError, logWarn } from './debug';

export interface GlobalErrorHandlerOptions {
  /**
   * Called after an unhandled rejection has been logged
   */
  onUnhandledRejection?: (reason: unknown, promise: Promise<unknown>) => void;

  /**
   * Called after an uncaught exception has been logged
   * @param origin - 'uncaughtException' or 'unhandledRejection'
   */
  onUncaughtException?: (error: Error, origin: string) => void;

  /**
   * Keep the process alive after a recoverable uncaught exception (default true)
   */
  preventExit?: boolean;

  /** Exit hook, replaced in tests */
  exit?: (code: number) => void;
}

/**
 * Install handlers for unhandled rejections and uncaught exceptions
 * @returns function that removes the handlers again
 */
export function setupGlobalErrorHandlers(options: GlobalErrorHandlerOptions = {}): () => void {
  const {
    onUnhandledRejection,
    onUncaughtException,
    preventExit = true,
    exit = (code: number) => process.exit(code)
  } = options;

  const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
    if (isRecoverableError(reason)) {
      logWarn('Unhandled rejection (recoverable):', describe(reason));
    } else {
      logError('Unhandled rejection:', describe(reason));
      if (reason instanceof Error && reason.stack) dbg(reason.stack);
    }
    onUnhandledRejection?.(reason, promise);
  };

  const uncaughtExceptionHandler = (error: Error, origin: string) => {
    logError(`Uncaught exception (${origin}):`, error.message);
    if (error.stack) dbg(error.stack);
    onUncaughtException?.(error, origin);

    if (!preventExit || !isRecoverableError(error)) {
      logError('Exiting');
      exit(1);
    }
  };

  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('uncaughtException', uncaughtExceptionHandler);
  dbg('global error handlers installed');

  return () => {
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('uncaughtException', uncaughtExceptionHandler);
    dbg('global error handlers removed');
  };
}

function describe(reason: unknown): string {
  if (reason instanceof ColorimeterError) return JSON.stringify(reason.toJSON());
  if (reason instanceof Error) return reason.message;
  return String(reason);
}

/**
 * Link-level failures end a session and are retried by the supervisor
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof ColorimeterError) return error.kind === ErrorKind.TRANSPORT;
  if (!(error instanceof Error)) return false;
  const recoverableMessages = ['Peripheral disconnected', 'Write failed', 'timed out'];
  return recoverableMessages.some(msg => error.message.includes(msg));
}
