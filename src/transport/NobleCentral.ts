import type { Characteristic, Peripheral } from '@abandonware/noble';
import { Disposable } from '../types';
import { normalizeUuid } from '../core/ColorPackets';
import { dbg, dbgV, logWarn } from '../utils/debug';
import { TransportError, errorMessage, withTimeout } from '../utils/errors';
import { BleCentral, BleCharacteristic, BleDevice, DeviceFilter, sameAddress } from './BleCentral';

type Noble = typeof import('@abandonware/noble');

class NobleCharacteristic implements BleCharacteristic {
  constructor(private readonly chr: Characteristic) {}

  get uuid(): string { return this.chr.uuid; }

  subscribe(): Promise<void> { return this.chr.subscribeAsync(); }
  unsubscribe(): Promise<void> { return this.chr.unsubscribeAsync(); }
  write(data: Buffer, withoutResponse: boolean): Promise<void> {
    return this.chr.writeAsync(data, withoutResponse);
  }

  onData(listener: (data: Buffer) => void): Disposable {
    const handler = (data: Buffer) => listener(Buffer.from(data));
    this.chr.on('data', handler);
    return { dispose: () => { this.chr.removeListener('data', handler); } };
  }
}

class NobleDevice implements BleDevice {
  constructor(private readonly peripheral: Peripheral) {}

  // macOS hides addresses; the peripheral uuid stands in
  get address(): string { return this.peripheral.address || this.peripheral.uuid; }
  get name(): string | undefined { return this.peripheral.advertisement?.localName || undefined; }

  isConnected(): boolean { return this.peripheral.state === 'connected'; }
  connect(): Promise<void> { return this.peripheral.connectAsync(); }
  disconnect(): Promise<void> { return this.peripheral.disconnectAsync(); }

  async discoverCharacteristics(): Promise<BleCharacteristic[]> {
    const { characteristics } = await this.peripheral.discoverAllServicesAndCharacteristicsAsync();
    dbgV(`characteristics: ${characteristics.map(c => c.uuid).join(', ')}`);
    return characteristics.map(c => new NobleCharacteristic(c));
  }

  onDisconnect(listener: () => void): Disposable {
    const handler = () => listener();
    this.peripheral.on('disconnect', handler);
    return { dispose: () => { this.peripheral.removeListener('disconnect', handler); } };
  }
}

/**
 * BLE central backed by @abandonware/noble. The native bindings are only loaded
 * on first use so that importing this module never touches the adapter.
 */
export class NobleCentral implements BleCentral {
  private noble?: Noble;

  private load(): Noble {
    if (!this.noble) {
      try {
        // the module is the noble singleton itself; a namespace import would lose its prototype
        const noble: Noble = require('@abandonware/noble');
        this.noble = noble;
      } catch (err) {
        throw new TransportError(`Bluetooth stack unavailable: ${errorMessage(err)}`);
      }
    }
    return this.noble;
  }

  private async waitPoweredOn(noble: Noble, timeoutMs: number): Promise<void> {
    if (noble.state === 'poweredOn') return;
    let poweredOn: () => void = () => undefined;
    const ready = new Promise<void>(resolve => { poweredOn = resolve; });
    const onState = (state: string) => {
      dbg(`adapter state: ${state}`);
      if (state === 'poweredOn') poweredOn();
    };
    noble.on('stateChange', onState);
    try {
      await withTimeout(ready, timeoutMs, 'Waiting for Bluetooth adapter');
    } finally {
      noble.removeListener('stateChange', onState);
    }
  }

  async findDevice(filter: DeviceFilter, timeoutMs: number): Promise<BleDevice | undefined> {
    const noble = this.load();
    await this.waitPoweredOn(noble, timeoutMs);

    const wanted = filter.requiredServices.map(normalizeUuid);
    dbgV(`requested address ${filter.address ?? '(any)'}`);

    return new Promise<BleDevice | undefined>((resolve, reject) => {
      let settled = false;
      const finish = (found: BleDevice | undefined) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        noble.removeListener('discover', onDiscover);
        noble.stopScanningAsync().then(
          () => resolve(found),
          (err: unknown) => {
            logWarn(`stop scanning failed: ${errorMessage(err)}`);
            resolve(found);
          }
        );
      };

      const onDiscover = (p: Peripheral) => {
        const device = new NobleDevice(p);
        const advertised = (p.advertisement?.serviceUuids ?? []).map(normalizeUuid);
        const capable = wanted.every(u => advertised.includes(u));
        dbg(`device ${device.address} (${device.name ?? 'unnamed'}), capable = ${capable}`);
        if (filter.address) {
          if (sameAddress(device.address, filter.address)) finish(device);
        } else if (capable) {
          finish(device);
        }
      };

      const timer = setTimeout(() => finish(undefined), timeoutMs);
      noble.on('discover', onDiscover);
      noble.startScanningAsync([], false).catch((err: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        noble.removeListener('discover', onDiscover);
        reject(new TransportError(`Failed to start scanning: ${errorMessage(err)}`));
      });
    });
  }
}
