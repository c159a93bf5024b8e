import { ColorimeterEvent, DeviceSessionOptions, DisconnectReason, SessionOutcome, SessionPhase } from '../src/types';
import { EventBus } from '../src/core/EventBus';
import { DeviceSession } from '../src/core/DeviceSession';
import { Gatt, PowerPacket, ScanPacket, encodeCommand } from '../src/core/ColorPackets';
import { BleCentral, BleCharacteristic, BleDevice } from '../src/transport/BleCentral';
import { SimulatedCentral, SimulatedDevice, SimulatedDeviceOptions } from '../src/transport/SimulatedCentral';
import { hex } from '../src/utils/codec';
import { setLogLevel, LogLevel } from '../src/utils/debug';
import { Recorder, until } from './helpers';

setLogLevel(LogLevel.ERROR);

interface Harness {
  bus: EventBus<ColorimeterEvent>;
  device: SimulatedDevice;
  central: SimulatedCentral;
  session: DeviceSession;
  recorder: Recorder;
  outcome: Promise<SessionOutcome>;
}

let running: Harness[] = [];

function start(
  deviceOptions: SimulatedDeviceOptions = {},
  sessionOptions: Partial<DeviceSessionOptions> = {},
  discoverable = true,
  device = new SimulatedDevice({ responseDelay: 1, ...deviceOptions })
): Harness {
  const bus = new EventBus<ColorimeterEvent>(64);
  const central = new SimulatedCentral(device);
  central.discoverable = discoverable;
  const recorder = new Recorder(bus.subscribe());
  const session = new DeviceSession(central, bus, {
    findTimeout: 1000,
    connectTimeout: 1000,
    keepaliveInterval: 60_000,
    duplicateWindow: 300,
    ...sessionOptions
  });
  const h = { bus, device, central, session, recorder, outcome: session.run() };
  running.push(h);
  return h;
}

/** Connects, then never answers characteristic discovery */
class StalledDevice extends SimulatedDevice {
  discoverCharacteristics(): Promise<BleCharacteristic[]> {
    return new Promise(() => undefined);
  }
}

const stalled = (sessionOptions: Partial<DeviceSessionOptions> = {}) =>
  start({}, { connectTimeout: 60_000, ...sessionOptions }, true, new StalledDevice());

const ready = (h: Harness) => until(() => h.session.phase === SessionPhase.READY);
const command = (h: Harness, type: 'scan' | 'calibrate' | 'status' | 'disconnect') =>
  h.bus.publish({ type: 'command', command: { type } });

afterEach(async () => {
  for (const h of running) {
    h.bus.publish({ type: 'exit' });
    await h.outcome;
  }
  running = [];
});

describe('DeviceSession setup', () => {
  test('publishes connecting, connecting with address, connected', async () => {
    const h = start();
    await h.recorder.waitFor('connected');
    expect(h.recorder.events).toEqual([
      { type: 'connecting' },
      { type: 'connecting', address: 'C0:10:0E:00:00:01', name: 'Simulated Colorimeter' },
      { type: 'connected', address: 'C0:10:0E:00:00:01', name: 'Simulated Colorimeter' }
    ]);
    await ready(h);
    expect(h.device.isSubscribed).toBe(true);
    expect(h.device.connectCount).toBe(1);
  });

  test('fails when no device is found', async () => {
    const h = start({}, {}, false);
    const outcome = await h.outcome;
    expect(outcome.kind).toBe('errored');
    expect(h.recorder.flush()).toEqual([{ type: 'connecting' }, { type: 'error', message: 'No device found' }]);
    expect(h.device.connectCount).toBe(0);
    expect(h.session.phase).toBe(SessionPhase.ERRORED);
  });

  test('fails when the write characteristic is missing', async () => {
    const h = start({ omitCharacteristic: 'write' });
    const outcome = await h.outcome;
    if (outcome.kind !== 'errored') throw new Error(`unexpected outcome ${outcome.kind}`);
    expect(outcome.error.message).toBe(`No ${Gatt.WRITE_CHARACTERISTIC} characteristic found`);
    expect(h.recorder.types()).toEqual(['connecting', 'connecting', 'connected', 'error']);
    expect(h.device.disconnectCount).toBe(1);
  });

  test('does not connect to a device with another address', async () => {
    const h = start({}, { address: 'AA:BB:CC:DD:EE:FF' });
    const outcome = await h.outcome;
    expect(outcome.kind).toBe('errored');
    expect(h.device.connectCount).toBe(0);
  });

  test('exit during discovery ends the session without touching the device', async () => {
    const device = new SimulatedDevice();
    let found: (d: BleDevice | undefined) => void = () => undefined;
    const central: BleCentral = {
      findDevice: () => new Promise(resolve => { found = resolve; })
    };
    const bus = new EventBus<ColorimeterEvent>();
    const recorder = new Recorder(bus.subscribe());
    const session = new DeviceSession(central, bus, {
      findTimeout: 1000, connectTimeout: 1000, keepaliveInterval: 60_000, duplicateWindow: 300
    });
    const outcome = session.run();
    await recorder.waitFor('connecting');

    bus.publish({ type: 'exit' });
    await new Promise(resolve => setImmediate(resolve));
    found(device);

    expect(await outcome).toEqual({ kind: 'exited' });
    expect(device.connectCount).toBe(0);
    expect(device.disconnectCount).toBe(0);
    expect(recorder.types()).toEqual(['connecting', 'exit']);
  });

  test('exit while service discovery hangs disconnects without waiting for it', async () => {
    const h = stalled();
    await h.recorder.waitFor('connected');
    h.bus.publish({ type: 'exit' });

    expect(await h.outcome).toEqual({ kind: 'exited' });
    expect(h.device.disconnectCount).toBe(1);
    expect(h.session.phase).toBe(SessionPhase.EXITED);
    expect(h.recorder.types()).toEqual(['connecting', 'connecting', 'connected', 'exit', 'disconnected']);
  });

  test('disconnect while service discovery hangs ends on user request', async () => {
    const h = stalled();
    await h.recorder.waitFor('connected');
    command(h, 'disconnect');

    expect(await h.outcome).toEqual({ kind: 'disconnected', reason: DisconnectReason.USER_REQUEST });
    expect(h.device.disconnectCount).toBe(1);
    expect(h.session.phase).toBe(SessionPhase.DISCONNECTED);
  });

  test('service discovery is bounded by the connect timeout', async () => {
    const h = stalled({ connectTimeout: 30 });
    const outcome = await h.outcome;
    if (outcome.kind !== 'errored') throw new Error(`unexpected outcome ${outcome.kind}`);
    expect(outcome.error.message).toBe('Service discovery timed out after 30ms');
    expect(h.recorder.flush()).toContainEqual({ type: 'error', message: 'Service discovery timed out after 30ms' });
    expect(h.device.disconnectCount).toBe(1);
    expect(h.session.phase).toBe(SessionPhase.ERRORED);
  });

  test('link drop during service discovery fails the setup', async () => {
    const h = stalled();
    await h.recorder.waitFor('connected');
    h.device.dropLink();

    const outcome = await h.outcome;
    if (outcome.kind !== 'errored') throw new Error(`unexpected outcome ${outcome.kind}`);
    expect(outcome.error.message).toBe('Device disconnected during setup');
    expect(h.recorder.types()).toEqual(['connecting', 'connecting', 'connected', 'error']);
  });

  test('commands issued while connecting run once ready', async () => {
    const h = start();
    command(h, 'scan');
    const ev = await h.recorder.waitFor('scan');
    if (ev.type !== 'scan') throw new Error('expected scan');
    expect(ev.result.index).toBe(1);
    expect(ev.result.rgb).toEqual([88, 120, 186]);
    expect(ev.result.lab[0]).toBeCloseTo(52.4, 2);
  });

  test('replayed command queue is executed in order', async () => {
    const h = start();
    h.bus.publish({ type: 'command_queue', commands: [{ type: 'calibrate' }, { type: 'scan' }] });
    await h.recorder.waitFor('scan');
    expect(h.device.writes.map(hex)).toEqual([hex(encodeCommand('CALIBRATE')), hex(encodeCommand('SCAN'))]);
    expect(h.recorder.types().filter(t => t === 'calibrated' || t === 'scan')).toEqual(['calibrated', 'scan']);
  });
});

describe('DeviceSession ready', () => {
  test('status writes info then battery, one at a time', async () => {
    const h = start();
    await ready(h);
    command(h, 'status');
    const power = await h.recorder.waitFor('power_level');
    expect(power).toEqual({ type: 'power_level', value: 87 });
    expect(h.device.writes.map(hex)).toEqual([hex(encodeCommand('INFO')), hex(encodeCommand('BATTERY'))]);
    expect(h.recorder.events).toContainEqual({
      type: 'device_info',
      values: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15]
    });
    const types = h.recorder.types();
    expect(types.indexOf('device_info')).toBeLessThan(types.indexOf('power_level'));
  });

  test('second command waits for the reply to the first', async () => {
    const h = start({ autoRespond: false });
    await ready(h);
    command(h, 'scan');
    command(h, 'calibrate');
    await until(() => h.device.writes.length === 1);
    await until(() => h.session.pendingFrames === 1);
    expect(h.device.writes.map(hex)).toEqual([hex(encodeCommand('SCAN'))]);

    h.device.notify(ScanPacket.build({ lab: [1, 2, 3], luv: [0, 0, 0], lch: [0, 0, 0], yxy: [0, 0, 0], rgb: [1, 2, 3] }));
    await h.recorder.waitFor('scan');
    await until(() => h.device.writes.length === 2);
    expect(hex(h.device.writes[1])).toBe(hex(encodeCommand('CALIBRATE')));
  });

  test('scan indices increase within a session', async () => {
    const h = start();
    await ready(h);
    command(h, 'scan');
    command(h, 'scan');
    await h.recorder.waitFor('scan');
    const second = await h.recorder.waitFor('scan');
    expect(second.type === 'scan' && second.result.index).toBe(2);
    expect(h.session.resultIndex).toBe(2);
  });

  test('identical scan frames inside the duplicate window are dropped', async () => {
    let clock = 1000;
    const h = start({ autoRespond: false }, { now: () => clock });
    await ready(h);
    const frame = ScanPacket.build({ lab: [50, 1, 2], luv: [0, 0, 0], lch: [0, 0, 0], yxy: [0, 0, 0], rgb: [9, 9, 9] });

    h.device.notify(frame);
    await h.recorder.waitFor('scan');

    clock = 1100;
    h.device.notify(frame);
    h.device.notify(PowerPacket.build(50));
    await h.recorder.waitFor('power_level');
    expect(h.recorder.types().filter(t => t === 'scan')).toHaveLength(1);

    clock = 1500;
    h.device.notify(frame);
    const again = await h.recorder.waitFor('scan');
    expect(again.type === 'scan' && again.result.index).toBe(2);
  });

  test('unknown frames are skipped', async () => {
    const h = start({ autoRespond: false });
    await ready(h);
    h.device.notify(Buffer.from([0xab, 0x30, 0x00]));
    h.device.notify(Buffer.from([0xab, 0x44, 0x00, 0x00]));
    h.device.notify(PowerPacket.build(12));
    expect(await h.recorder.waitFor('power_level')).toEqual({ type: 'power_level', value: 12 });
    expect(h.session.phase).toBe(SessionPhase.READY);
  });

  test('idle link triggers a battery request', async () => {
    const h = start({}, { keepaliveInterval: 20 });
    await ready(h);
    expect(await h.recorder.waitFor('power_level')).toEqual({ type: 'power_level', value: 87 });
    expect(hex(h.device.writes[0])).toBe(hex(encodeCommand('BATTERY')));
  });
});

describe('DeviceSession termination', () => {
  test('exit unsubscribes, disconnects and publishes one disconnected', async () => {
    const h = start();
    await ready(h);
    h.bus.publish({ type: 'exit' });
    expect(await h.outcome).toEqual({ kind: 'exited' });

    const events = h.recorder.flush();
    expect(events.filter(e => e.type === 'disconnected')).toHaveLength(1);
    expect(h.device.isSubscribed).toBe(false);
    expect(h.device.disconnectCount).toBe(1);
    expect(h.session.phase).toBe(SessionPhase.EXITED);

    command(h, 'scan');
    await new Promise(resolve => setTimeout(resolve, 5));
    expect(h.device.writes).toHaveLength(0);
  });

  test('disconnect command ends the session on user request', async () => {
    const h = start();
    await ready(h);
    command(h, 'disconnect');
    expect(await h.outcome).toEqual({ kind: 'disconnected', reason: DisconnectReason.USER_REQUEST });
    expect(h.recorder.types().filter(t => t === 'disconnected')).toHaveLength(1);
    expect(h.device.disconnectCount).toBe(1);
  });

  test('link loss is reported as a disconnect', async () => {
    const h = start();
    await ready(h);
    h.device.dropLink();
    expect(await h.outcome).toEqual({ kind: 'disconnected', reason: DisconnectReason.LINK_LOST });
    expect(h.recorder.types()).toContain('disconnected');
    expect(h.session.phase).toBe(SessionPhase.DISCONNECTED);
  });

  test('write failure ends the session with an error', async () => {
    const h = start();
    await ready(h);
    h.device.failNextWrite = new Error('gatt busy');
    command(h, 'scan');
    const outcome = await h.outcome;
    if (outcome.kind !== 'errored') throw new Error(`unexpected outcome ${outcome.kind}`);
    expect(outcome.error.message).toBe('Write failed: gatt busy');
    expect(h.recorder.flush()).toContainEqual({ type: 'error', message: 'Write failed: gatt busy' });
  });

  test('run may only be called once', async () => {
    const h = start();
    await ready(h);
    await expect(h.session.run()).rejects.toThrow('may only be called once');
  });
});
