import { z } from 'zod';
import { DeviceCommand, ListenAddress, OutputFormat } from './types';
import { LogLevel, parseLogLevel } from './utils/debug';
import { ColorimeterError, ErrorKind } from './utils/errors';

/**
 * Validated runtime configuration; all durations in milliseconds
 */
export interface ColorimeterConfig {
  device?: string;
  format: OutputFormat;
  interactive: boolean;
  /** Undefined keeps the level taken from the environment */
  logLevel?: LogLevel;
  findTimeout: number;
  connectTimeout: number;
  reconnectAttempts: number;
  reconnectInterval: number;
  keepaliveInterval: number;
  duplicateWindow: number;
  remain: boolean;
  initialCommands: DeviceCommand[];
  listen?: ListenAddress;
  simulate: boolean;
}

export const DEFAULTS = {
  findTimeoutSec: 5,
  connectTimeoutSec: 10,
  reconnectAttempts: 3,
  reconnectIntervalSec: 5,
  keepaliveSec: 60,
  duplicateWindowMs: 300
} as const;

/**
 * Parse `host:port`; IPv6 hosts may be given in brackets
 */
export function parseListenAddress(value: string): ListenAddress | undefined {
  const sep = value.lastIndexOf(':');
  if (sep <= 0) return undefined;
  let host = value.slice(0, sep);
  const portText = value.slice(sep + 1);
  if (host.startsWith('[') && host.endsWith(']')) host = host.slice(1, -1);
  if (!host || !/^\d+$/.test(portText)) return undefined;
  const port = Number(portText);
  if (port < 1 || port > 65535) return undefined;
  return { host, port };
}

const seconds = (fallback: number) =>
  z.coerce.number().positive().default(fallback).transform(s => Math.round(s * 1000));

const flag = z.boolean().default(false);

const CliOptionsSchema = z.object({
  device: z.string().trim().min(1).optional(),
  format: z.enum(['text', 'json']).default('text'),
  nonInteractive: flag,
  logLevel: z.string().optional().transform((name, ctx) => {
    if (name === undefined) return undefined;
    const level = parseLogLevel(name);
    if (level === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level "${name}"` });
      return z.NEVER;
    }
    return level;
  }),
  findTimeout: seconds(DEFAULTS.findTimeoutSec),
  connectTimeout: seconds(DEFAULTS.connectTimeoutSec),
  reconnectAttempts: z.coerce.number().int().positive().default(DEFAULTS.reconnectAttempts),
  reconnectInterval: z.coerce.number().nonnegative().default(DEFAULTS.reconnectIntervalSec)
    .transform(s => Math.round(s * 1000)),
  keepalive: seconds(DEFAULTS.keepaliveSec),
  duplicateWindow: z.coerce.number().int().nonnegative().default(DEFAULTS.duplicateWindowMs),
  remain: flag,
  getStatus: flag,
  calibrate: flag,
  scan: flag,
  listen: z.string().optional().transform((value, ctx) => {
    if (value === undefined) return undefined;
    const addr = parseListenAddress(value);
    if (!addr) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected host:port, got "${value}"` });
      return z.NEVER;
    }
    return addr;
  }),
  simulate: flag
});

export type CliOptions = z.input<typeof CliOptionsSchema>;

/**
 * Validate raw command-line options
 * @throws ColorimeterError (USER_INPUT) listing every invalid option
 */
export function parseConfig(options: unknown): ColorimeterConfig {
  const parsed = CliOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw new ColorimeterError(ErrorKind.USER_INPUT, `Invalid options: ${details.join('; ')}`, { issues: details });
  }
  const o = parsed.data;

  const initialCommands: DeviceCommand[] = [];
  if (o.getStatus) initialCommands.push({ type: 'status' });
  if (o.calibrate) initialCommands.push({ type: 'calibrate' });
  if (o.scan) initialCommands.push({ type: 'scan' });

  return {
    device: o.device,
    format: o.format,
    interactive: !o.nonInteractive,
    logLevel: o.logLevel,
    findTimeout: o.findTimeout,
    connectTimeout: o.connectTimeout,
    reconnectAttempts: o.reconnectAttempts,
    reconnectInterval: o.reconnectInterval,
    keepaliveInterval: o.keepalive,
    duplicateWindow: o.duplicateWindow,
    remain: o.remain,
    initialCommands,
    listen: o.listen,
    simulate: o.simulate
  };
}
