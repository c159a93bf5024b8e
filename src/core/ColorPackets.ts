import { Command, ScanReading, Triple } from '../types';
import { fromHex, les16 } from '../utils/codec';

export const FRAME_SENTINEL = 0xab;

// GATT identifiers exposed by the colorimeter
export const Gatt = {
  WRITE_SERVICE: '0000ffe5-0000-1000-8000-00805f9b34fb',
  WRITE_CHARACTERISTIC: '0000ffe9-0000-1000-8000-00805f9b34fb',
  NOTIFY_SERVICE: '0000ffe0-0000-1000-8000-00805f9b34fb',
  NOTIFY_CHARACTERISTIC: '0000ffe4-0000-1000-8000-00805f9b34fb'
} as const;

// Fixed command frames; the device accepts no parameters
const COMMAND_HEX = {
  SCAN: 'AB440000000036001864',
  CALIBRATE: 'AB202E000200904F',
  BATTERY: 'AB200B0002009B43',
  INFO: 'AB400000000014004504'
} as const;

export type FrameCommand = keyof typeof COMMAND_HEX;

export function encodeCommand(cmd: FrameCommand): Buffer {
  return fromHex(COMMAND_HEX[cmd]);
}

/**
 * Frames written for a bus command, in send order
 */
export function framesForCommand(cmd: Command): Buffer[] {
  switch (cmd.type) {
    case 'scan':
      return [encodeCommand('SCAN')];
    case 'calibrate':
      return [encodeCommand('CALIBRATE')];
    case 'status':
      return [encodeCommand('INFO'), encodeCommand('BATTERY')];
    default:
      return [];
  }
}

export const Sizes = {
  MIN_NOTIFICATION: 3,
  SCAN: 39,
  POWER: 8,
  INFO: 40
} as const;

const COLOR_SCALE = 100;

// Scan result (AB 44 ..)
export const ScanPacket = {
  HEADER: 8,
  SKIP: 4,
  isScan(buf: Buffer): boolean { return buf[1] === 0x44; },
  parse(buf: Buffer): ScanReading {
    let off = ScanPacket.HEADER;
    const readTriple = (): Triple => {
      const t: Triple = [0, 0, 0];
      for (let i = 0; i < 3; i++) {
        t[i] = les16.read(buf, off) / COLOR_SCALE;
        off += 2;
      }
      return t;
    };
    const lab = readTriple();
    const luv = readTriple();
    const lch = readTriple();
    const yxy = readTriple();
    off += ScanPacket.SKIP; // CMYK-ish block, unused
    const rgb: Triple = [buf[off], buf[off + 1], buf[off + 2]];
    return { lab, luv, lch, yxy, rgb };
  },
  build(reading: ScanReading): Buffer {
    const b = Buffer.alloc(Sizes.SCAN);
    encodeCommand('SCAN').copy(b, 0, 0, ScanPacket.HEADER);
    let off = ScanPacket.HEADER;
    for (const t of [reading.lab, reading.luv, reading.lch, reading.yxy]) {
      for (const v of t) {
        les16.write(b, off, Math.round(v * COLOR_SCALE));
        off += 2;
      }
    }
    off += ScanPacket.SKIP;
    reading.rgb.forEach((c, i) => { b[off + i] = c & 0xff; });
    return b;
  }
};

// Power level (AB 20 0B)
export const PowerPacket = {
  OFFSET: 6,
  parse(buf: Buffer): number { return les16.read(buf, PowerPacket.OFFSET); },
  build(level: number): Buffer {
    const b = Buffer.alloc(Sizes.POWER);
    encodeCommand('BATTERY').copy(b, 0, 0, 6);
    les16.write(b, PowerPacket.OFFSET, level);
    return b;
  }
};

// Device info (AB 40 00)
export const InfoPacket = {
  OFFSET: 10,
  COUNT: 15,
  parse(buf: Buffer): number[] {
    const values: number[] = [];
    for (let i = 0; i < InfoPacket.COUNT; i++) {
      values.push(les16.read(buf, InfoPacket.OFFSET + i * 2));
    }
    return values;
  },
  build(values: number[]): Buffer {
    const b = Buffer.alloc(Sizes.INFO);
    encodeCommand('INFO').copy(b, 0, 0, InfoPacket.OFFSET);
    for (let i = 0; i < InfoPacket.COUNT; i++) {
      les16.write(b, InfoPacket.OFFSET + i * 2, values[i] ?? 0);
    }
    return b;
  }
};

// Calibration complete (AB 20 2E), as answered by the device
export const CalibratedPacket = {
  build(): Buffer { return fromHex('AB202E00020000002DF4'); }
};

export type Notification =
  | { kind: 'scan'; reading: ScanReading }
  | { kind: 'calibrated' }
  | { kind: 'power_level'; value: number }
  | { kind: 'device_info'; values: number[] }
  | { kind: 'unrecognized'; reason: string };

/**
 * Decode one notification frame; malformed frames come back as `unrecognized`
 */
export function decodeNotification(buf: Buffer): Notification {
  if (buf.length < Sizes.MIN_NOTIFICATION) {
    return { kind: 'unrecognized', reason: 'too short' };
  }
  if (buf[0] !== FRAME_SENTINEL) {
    return { kind: 'unrecognized', reason: 'bad sentinel' };
  }
  const truncated = (need: number): Notification =>
    ({ kind: 'unrecognized', reason: `truncated (${buf.length} < ${need} bytes)` });

  if (ScanPacket.isScan(buf)) {
    if (buf.length < Sizes.SCAN) return truncated(Sizes.SCAN);
    return { kind: 'scan', reading: ScanPacket.parse(buf) };
  }
  const b = buf[1];
  const c = buf[2];
  if (b === 0x20 && c === 0x2e) {
    return { kind: 'calibrated' };
  }
  if (b === 0x20 && c === 0x0b) {
    if (buf.length < Sizes.POWER) return truncated(Sizes.POWER);
    return { kind: 'power_level', value: PowerPacket.parse(buf) };
  }
  if (b === 0x40 && c === 0x00) {
    if (buf.length < Sizes.INFO) return truncated(Sizes.INFO);
    return { kind: 'device_info', values: InfoPacket.parse(buf) };
  }
  return { kind: 'unrecognized', reason: 'unknown kind' };
}

/**
 * Normalize a GATT UUID for comparison: lower-case, no dashes, base UUIDs shortened to 16 bits
 */
export function normalizeUuid(uuid: string): string {
  const flat = uuid.replace(/-/g, '').toLowerCase();
  const m = /^0000([0-9a-f]{4})00001000800000805f9b34fb$/.exec(flat);
  return m ? m[1] : flat;
}
