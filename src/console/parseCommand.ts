import { ColorimeterEvent } from '../types';

/**
 * Map a command name from the console or a network client to its bus event
 */
export function eventForCommandName(name: string): ColorimeterEvent | undefined {
  switch (name.toLowerCase()) {
    case 'exit':
      return { type: 'exit' };
    case 'calibrate':
      return { type: 'command', command: { type: 'calibrate' } };
    case 'scan':
      return { type: 'command', command: { type: 'scan' } };
    case 'status':
      return { type: 'command', command: { type: 'status' } };
    case 'disconnect':
      return { type: 'command', command: { type: 'disconnect' } };
    case 'reconnect':
      return { type: 'command', command: { type: 'reconnect' } };
    default:
      return undefined;
  }
}

/**
 * Parse one console line; blank lines yield nothing, unknown words an error event
 */
export function parseConsoleLine(line: string): ColorimeterEvent | undefined {
  const [cmd] = line.trim().split(/\s+/);
  if (!cmd) return undefined;
  return eventForCommandName(cmd) ?? { type: 'error', message: `Unknown command: ${cmd}` };
}
