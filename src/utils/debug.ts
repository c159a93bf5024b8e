export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  trace: LogLevel.TRACE
};

export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

let currentLevel: LogLevel = parseLogLevel(process.env.COLORIMETER_LOG_LEVEL) ?? LogLevel.INFO;

export function setLogLevel(level: LogLevel) { currentLevel = level; }
export function getLogLevel(): LogLevel { return currentLevel; }

// stdout is reserved for event output
function write(level: LogLevel, tag: string, args: unknown[]) {
  if (currentLevel >= level) console.error(`[colorimeter] ${tag}`, ...args);
}

export function logError(...args: unknown[]) { write(LogLevel.ERROR, 'ERROR', args); }
export function logWarn(...args: unknown[]) { write(LogLevel.WARN, 'WARN ', args); }
export function logInfo(...args: unknown[]) { write(LogLevel.INFO, 'INFO ', args); }
export function dbg(...args: unknown[]) { write(LogLevel.DEBUG, 'DEBUG', args); }
export function dbgV(...args: unknown[]) { write(LogLevel.TRACE, 'TRACE', args); }
