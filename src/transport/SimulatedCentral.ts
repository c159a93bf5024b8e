import { EventEmitter } from 'events';
import { Disposable, ScanReading } from '../types';
import {
  CalibratedPacket, Gatt, InfoPacket, PowerPacket, ScanPacket, encodeCommand, normalizeUuid
} from '../core/ColorPackets';
import { dbgV } from '../utils/debug';
import { TransportError } from '../utils/errors';
import { BleCentral, BleCharacteristic, BleDevice, DeviceFilter, sameAddress } from './BleCentral';

export interface SimulatedDeviceOptions {
  address?: string;
  name?: string;
  /** Answer command frames with notifications (default true) */
  autoRespond?: boolean;
  /** Delay before an answer is notified (ms) */
  responseDelay?: number;
  batteryLevel?: number;
  deviceInfo?: number[];
  /** Readings returned by successive scans; cycles when exhausted */
  readings?: ScanReading[];
  /** Leave out one of the GATT characteristics */
  omitCharacteristic?: 'write' | 'notify';
}

const DEFAULT_READINGS: ScanReading[] = [
  { lab: [52.4, 10.21, -33.07], luv: [52.4, -8.5, -50.12], lch: [52.4, 34.61, 287.16], yxy: [20.46, 0.21, 0.2], rgb: [88, 120, 186] },
  { lab: [71.02, -2.3, 60.5], luv: [71.02, 18.4, 70.03], lch: [71.02, 60.54, 92.18], yxy: [42.61, 0.43, 0.46], rgb: [196, 176, 62] }
];

class SimulatedCharacteristic implements BleCharacteristic {
  private readonly ev = new EventEmitter();
  public subscribed = false;

  constructor(public readonly uuid: string, private readonly onWrite?: (data: Buffer) => Promise<void>) {}

  async subscribe() { this.subscribed = true; }
  async unsubscribe() { this.subscribed = false; }

  async write(data: Buffer, _withoutResponse: boolean) {
    if (!this.onWrite) throw new TransportError(`Characteristic ${this.uuid} is not writable`);
    await this.onWrite(Buffer.from(data));
  }

  onData(listener: (data: Buffer) => void): Disposable {
    this.ev.on('data', listener);
    return { dispose: () => { this.ev.removeListener('data', listener); } };
  }

  emitData(data: Buffer) {
    if (this.subscribed) this.ev.emit('data', data);
  }
}

/**
 * In-process colorimeter speaking the real frame format
 */
export class SimulatedDevice implements BleDevice {
  public readonly address: string;
  public readonly name?: string;
  /** Every frame written to the device, in order */
  public readonly writes: Buffer[] = [];
  public connectCount = 0;
  public disconnectCount = 0;
  /** Reject the next write with this error */
  public failNextWrite?: Error;
  /** Reject connect() with this error */
  public failConnect?: Error;

  private readonly ev = new EventEmitter();
  private connected = false;
  private scanCount = 0;
  private readonly notifyChr: SimulatedCharacteristic;
  private readonly writeChr: SimulatedCharacteristic;
  private readonly timers = new Set<NodeJS.Timeout>();

  constructor(private readonly options: SimulatedDeviceOptions = {}) {
    this.address = options.address ?? 'C0:10:0E:00:00:01';
    this.name = options.name ?? 'Simulated Colorimeter';
    this.notifyChr = new SimulatedCharacteristic(Gatt.NOTIFY_CHARACTERISTIC);
    this.writeChr = new SimulatedCharacteristic(Gatt.WRITE_CHARACTERISTIC, data => this.receive(data));
  }

  isConnected(): boolean { return this.connected; }

  async connect() {
    if (this.failConnect) throw this.failConnect;
    this.connected = true;
    this.connectCount++;
  }

  async disconnect() {
    this.disconnectCount++;
    this.dropLink();
  }

  async discoverCharacteristics(): Promise<BleCharacteristic[]> {
    if (!this.connected) throw new TransportError('Not connected');
    const chars: BleCharacteristic[] = [];
    if (this.options.omitCharacteristic !== 'write') chars.push(this.writeChr);
    if (this.options.omitCharacteristic !== 'notify') chars.push(this.notifyChr);
    return chars;
  }

  onDisconnect(listener: () => void): Disposable {
    this.ev.on('disconnect', listener);
    return { dispose: () => { this.ev.removeListener('disconnect', listener); } };
  }

  get isSubscribed(): boolean { return this.notifyChr.subscribed; }

  /**
   * Push a raw notification frame to the subscriber
   */
  notify(frame: Buffer) {
    this.notifyChr.emitData(Buffer.from(frame));
  }

  /**
   * Drop the link as if the device went out of range
   */
  dropLink() {
    for (const t of this.timers) clearTimeout(t);
    this.timers.clear();
    if (!this.connected) return;
    this.connected = false;
    this.notifyChr.subscribed = false;
    this.ev.emit('disconnect');
  }

  private async receive(data: Buffer) {
    if (!this.connected) throw new TransportError('Not connected');
    if (this.failNextWrite) {
      const err = this.failNextWrite;
      this.failNextWrite = undefined;
      throw err;
    }
    this.writes.push(data);
    if (this.options.autoRespond === false) return;
    const reply = this.replyTo(data);
    if (!reply) return;
    const t = setTimeout(() => {
      this.timers.delete(t);
      dbgV(`simulated device notifies ${reply.length} bytes`);
      this.notify(reply);
    }, this.options.responseDelay ?? 50);
    this.timers.add(t);
  }

  private replyTo(data: Buffer): Buffer | undefined {
    if (data.equals(encodeCommand('SCAN'))) {
      const readings = this.options.readings ?? DEFAULT_READINGS;
      const reading = readings[this.scanCount++ % readings.length];
      return ScanPacket.build(reading);
    }
    if (data.equals(encodeCommand('CALIBRATE'))) return CalibratedPacket.build();
    if (data.equals(encodeCommand('BATTERY'))) return PowerPacket.build(this.options.batteryLevel ?? 87);
    if (data.equals(encodeCommand('INFO'))) {
      return InfoPacket.build(this.options.deviceInfo ?? Array.from({ length: InfoPacket.COUNT }, (_, i) => i + 1));
    }
    return undefined;
  }
}

/**
 * Central that always finds its one simulated device (when the filter allows)
 */
export class SimulatedCentral implements BleCentral {
  public findCount = 0;
  /** When false, discovery finds nothing */
  public discoverable = true;

  constructor(public readonly device: SimulatedDevice = new SimulatedDevice()) {}

  async findDevice(filter: DeviceFilter, _timeoutMs: number): Promise<BleDevice | undefined> {
    this.findCount++;
    if (!this.discoverable) return undefined;
    if (filter.address && !sameAddress(filter.address, this.device.address)) return undefined;
    const advertised = [Gatt.WRITE_SERVICE, Gatt.NOTIFY_SERVICE].map(normalizeUuid);
    if (!filter.requiredServices.map(normalizeUuid).every(u => advertised.includes(u))) return undefined;
    return this.device;
  }
}
