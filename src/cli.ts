#!/usr/bin/env node
/**
 * Command-line entry: connects to the colorimeter and runs the console, the
 * log loop and the optional WebSocket broadcaster on one event bus.
 */

import { Command as Program } from 'commander';
import { ColorimeterEvent } from './types';
import { ColorimeterConfig, DEFAULTS, parseConfig } from './config';
import { EventBus } from './core/EventBus';
import { DeviceSession } from './core/DeviceSession';
import { SessionFactory, Supervisor } from './core/Supervisor';
import { BleCentral } from './transport/BleCentral';
import { NobleCentral } from './transport/NobleCentral';
import { SimulatedCentral } from './transport/SimulatedCentral';
import { InteractiveConsole } from './console/InteractiveConsole';
import { BroadcastServer } from './server/BroadcastServer';
import { createPrinter } from './output/printers';
import { runLogLoop } from './output/logLoop';
import { dbg, logError, setLogLevel } from './utils/debug';
import { errorMessage } from './utils/errors';
import { setupGlobalErrorHandlers } from './utils/errorHandling';

export function buildProgram(): Program {
  return new Program()
    .name('colorimeter')
    .description('Talk to a BLE colorimeter: scan colors, calibrate, read battery and device info')
    .version('0.1.0')
    .option('-d, --device <address>', 'only connect to the device with this address')
    .option('-f, --format <format>', 'output format: text or json (default: text)')
    .option('-n, --non-interactive', 'print events without a console')
    .option('--log-level <level>', 'error, warn, info, debug or trace (default: $COLORIMETER_LOG_LEVEL or info)')
    .option('--find-timeout <s>', `device discovery timeout (default: ${DEFAULTS.findTimeoutSec})`)
    .option('--connect-timeout <s>', `connect timeout (default: ${DEFAULTS.connectTimeoutSec})`)
    .option('--reconnect-attempts <n>', `attempts before giving up (default: ${DEFAULTS.reconnectAttempts})`)
    .option('--reconnect-interval <s>', `delay between attempts (default: ${DEFAULTS.reconnectIntervalSec})`)
    .option('--keepalive <s>', `idle time before a battery request (default: ${DEFAULTS.keepaliveSec})`)
    .option('--duplicate-window <ms>', `drop repeated scan frames within this window (default: ${DEFAULTS.duplicateWindowMs})`)
    .option('-r, --remain', 'keep reconnecting after the link is lost or a session fails')
    .option('-g, --get-status', 'request battery and device info once connected')
    .option('-c, --calibrate', 'calibrate once connected')
    .option('-s, --scan', 'scan once connected')
    .option('-l, --listen <host:port>', 'serve events over WebSocket')
    .option('--simulate', 'use a simulated colorimeter instead of Bluetooth');
}

/**
 * Wire the bus, supervisor and consumers, and run until `exit`
 */
export async function runColorimeter(config: ColorimeterConfig, central?: BleCentral): Promise<void> {
  const bus = new EventBus<ColorimeterEvent>();
  const ble = central ?? (config.simulate ? new SimulatedCentral() : new NobleCentral());

  const createSession: SessionFactory = () => new DeviceSession(ble, bus, {
    address: config.device,
    findTimeout: config.findTimeout,
    connectTimeout: config.connectTimeout,
    keepaliveInterval: config.keepaliveInterval,
    duplicateWindow: config.duplicateWindow
  });
  const supervisor = new Supervisor(bus, createSession, {
    remain: config.remain,
    maxAttempts: config.reconnectAttempts,
    retryInterval: config.reconnectInterval,
    initialCommands: config.initialCommands,
    // without a console or a server nothing could re-arm an idle supervisor
    stopWhenIdle: !config.interactive && !config.listen
  });

  const failed = (what: string) => (err: unknown) => {
    logError(`${what} failed: ${errorMessage(err)}`);
    process.exitCode = 1;
    bus.publish({ type: 'exit' });
  };

  // consumers subscribe before the supervisor publishes anything
  const printer = createPrinter(config.format);
  const tasks: Promise<void>[] = [
    (config.interactive ? new InteractiveConsole(bus, printer).run() : runLogLoop(bus, printer))
      .catch(failed('Console'))
  ];
  if (config.listen) {
    tasks.push(new BroadcastServer(bus, config.listen).run().catch(failed('WebSocket server')));
  }

  const onSigint = () => bus.publish({ type: 'exit' });
  process.on('SIGINT', onSigint);
  try {
    tasks.push(supervisor.run().then(reason => {
      dbg(`supervisor finished: ${reason}`);
      if (reason === 'idle') {
        logError('Giving up: no device session and no way to send commands');
        process.exitCode = 1;
      }
      // a clean disconnect without --remain, or giving up, ends the program
      if (reason !== 'exit') bus.publish({ type: 'exit' });
    }, failed('Supervisor')));
    await Promise.all(tasks);
  } finally {
    process.off('SIGINT', onSigint);
    bus.close();
  }
}

async function main(argv: string[]) {
  const program = buildProgram().parse(argv);

  let config: ColorimeterConfig;
  try {
    config = parseConfig(program.opts());
  } catch (err) {
    logError(errorMessage(err));
    process.exit(1);
  }
  if (config.logLevel !== undefined) setLogLevel(config.logLevel);

  const removeHandlers = setupGlobalErrorHandlers();
  try {
    await runColorimeter(config);
  } finally {
    removeHandlers();
  }
  // the Bluetooth bindings keep handles open after the last session
  process.exit(process.exitCode ?? 0);
}

if (require.main === module) {
  main(process.argv).catch((err: unknown) => {
    logError('Unexpected error:', errorMessage(err));
    process.exit(1);
  });
}
