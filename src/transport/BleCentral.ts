import { Disposable } from '../types';

export interface DeviceFilter {
  /** Exact device address (case-insensitive); otherwise the first capable device */
  address?: string;
  /** Services a device must advertise to be picked without an address */
  requiredServices: string[];
}

export interface BleCharacteristic {
  readonly uuid: string;
  subscribe(): Promise<void>;
  unsubscribe(): Promise<void>;
  write(data: Buffer, withoutResponse: boolean): Promise<void>;
  onData(listener: (data: Buffer) => void): Disposable;
}

export interface BleDevice {
  readonly address: string;
  readonly name?: string;
  isConnected(): boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  discoverCharacteristics(): Promise<BleCharacteristic[]>;
  /** Fires when the link drops for any reason */
  onDisconnect(listener: () => void): Disposable;
}

/**
 * Entry point into a platform Bluetooth stack
 */
export interface BleCentral {
  /**
   * Scan until a matching device is seen or the timeout passes
   * @returns undefined when nothing matched in time
   */
  findDevice(filter: DeviceFilter, timeoutMs: number): Promise<BleDevice | undefined>;
}

export function sameAddress(a: string, b: string): boolean {
  const norm = (s: string) => s.replace(/[-:]/g, '').toLowerCase();
  return norm(a) === norm(b);
}
