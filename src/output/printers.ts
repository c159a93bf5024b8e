import { ColorimeterEvent, OutputFormat, ScanResult, Triple } from '../types';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface OutputPrinter {
  /** One display string per event, or undefined when the event is not shown */
  formatEvent(event: ColorimeterEvent): string | undefined;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function formatTriple(t: Triple): string {
  return t.map(n => String(round2(n))).join(', ');
}

export class TextPrinter implements OutputPrinter {
  formatEvent(event: ColorimeterEvent): string | undefined {
    switch (event.type) {
      case 'scan': {
        const r = event.result;
        return [
          `Scan result #: ${r.index}`,
          `\tLab: ${formatTriple(r.lab)}`,
          `\tLuv: ${formatTriple(r.luv)}`,
          `\tLch: ${formatTriple(r.lch)}`,
          `\tyxY: ${formatTriple(r.yxy)}`,
          `\tRGB: ${formatTriple(r.rgb)}`
        ].join('\n');
      }
      case 'power_level':
        return `Power level: ${event.value}`;
      case 'device_info':
        return `Device info: ${event.values.join(', ')}`;
      case 'error':
        return `Error: ${event.message}`;
      case 'calibrated':
        return 'Calibrated';
      case 'disconnected':
        return 'Disconnected';
      case 'connecting':
        return event.address ? `Connecting to ${event.address} (${event.name ?? 'unnamed'})` : undefined;
      case 'connected':
        return `Connected to ${event.address} (${event.name ?? 'unnamed'})`;
      default:
        return undefined;
    }
  }
}

export class JsonPrinter implements OutputPrinter {
  formatResult(res: ScanResult): JsonValue {
    const triple = (t: Triple): JsonValue => t.map(round2);
    return {
      lab: triple(res.lab),
      luv: triple(res.luv),
      lch: triple(res.lch),
      yxy: triple(res.yxy),
      rgb: [...res.rgb]
    };
  }

  /**
   * Event as a `[tag, ...fields]` array; commands have no JSON form
   */
  formatEventJson(event: ColorimeterEvent): JsonValue[] | undefined {
    switch (event.type) {
      case 'exit':
        return ['exit'];
      case 'error':
        return ['error', event.message];
      case 'scan':
        return ['scan', event.result.index, this.formatResult(event.result)];
      case 'connecting':
        return ['connecting', event.address ?? null, event.name ?? null];
      case 'connected':
        return ['connected', event.address, event.name ?? null];
      case 'disconnected':
        return ['disconnected'];
      case 'power_level':
        return ['power_level', event.value];
      case 'device_info':
        return ['device_info', [...event.values]];
      case 'calibrated':
        return ['calibrated'];
      case 'command':
      case 'command_queue':
        return undefined;
    }
  }

  formatEvent(event: ColorimeterEvent): string | undefined {
    const json = this.formatEventJson(event);
    return json ? JSON.stringify(json) : undefined;
  }
}

export function createPrinter(format: OutputFormat): OutputPrinter {
  return format === 'json' ? new JsonPrinter() : new TextPrinter();
}
