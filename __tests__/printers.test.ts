import { JsonPrinter, TextPrinter, createPrinter, round2 } from '../src/output/printers';
import { ColorimeterEvent, ScanResult } from '../src/types';

const result: ScanResult = {
  index: 3,
  lab: [52.456, -1.5, 0],
  luv: [1, 2, 3],
  lch: [10.001, 20.5, 30.25],
  yxy: [0.1234, 0.5, 0.75],
  rgb: [88, 120, 186]
};

describe('TextPrinter', () => {
  const printer = new TextPrinter();

  test('scan result block', () => {
    expect(printer.formatEvent({ type: 'scan', result })).toBe([
      'Scan result #: 3',
      '\tLab: 52.46, -1.5, 0',
      '\tLuv: 1, 2, 3',
      '\tLch: 10, 20.5, 30.25',
      '\tyxY: 0.12, 0.5, 0.75',
      '\tRGB: 88, 120, 186'
    ].join('\n'));
  });

  test('status lines', () => {
    expect(printer.formatEvent({ type: 'power_level', value: 87 })).toBe('Power level: 87');
    expect(printer.formatEvent({ type: 'device_info', values: [1, 2, 3] })).toBe('Device info: 1, 2, 3');
    expect(printer.formatEvent({ type: 'calibrated' })).toBe('Calibrated');
    expect(printer.formatEvent({ type: 'error', message: 'No device found' })).toBe('Error: No device found');
  });

  test('connection lines', () => {
    expect(printer.formatEvent({ type: 'connecting' })).toBeUndefined();
    expect(printer.formatEvent({ type: 'connecting', address: 'AA:BB' })).toBe('Connecting to AA:BB (unnamed)');
    expect(printer.formatEvent({ type: 'connected', address: 'AA:BB', name: 'Meter' })).toBe('Connected to AA:BB (Meter)');
    expect(printer.formatEvent({ type: 'disconnected' })).toBe('Disconnected');
  });

  test('commands are not printed', () => {
    expect(printer.formatEvent({ type: 'command', command: { type: 'scan' } })).toBeUndefined();
    expect(printer.formatEvent({ type: 'exit' })).toBeUndefined();
  });
});

describe('JsonPrinter', () => {
  const printer = new JsonPrinter();

  test('scan result', () => {
    expect(printer.formatEvent({ type: 'scan', result })).toBe(
      '["scan",3,{"lab":[52.46,-1.5,0],"luv":[1,2,3],"lch":[10,20.5,30.25],"yxy":[0.12,0.5,0.75],"rgb":[88,120,186]}]'
    );
  });

  test('event arrays', () => {
    const cases: Array<[ColorimeterEvent, string]> = [
      [{ type: 'exit' }, '["exit"]'],
      [{ type: 'error', message: 'oops' }, '["error","oops"]'],
      [{ type: 'connecting' }, '["connecting",null,null]'],
      [{ type: 'connected', address: 'AA:BB' }, '["connected","AA:BB",null]'],
      [{ type: 'disconnected' }, '["disconnected"]'],
      [{ type: 'power_level', value: 5 }, '["power_level",5]'],
      [{ type: 'device_info', values: [7, 8] }, '["device_info",[7,8]]'],
      [{ type: 'calibrated' }, '["calibrated"]']
    ];
    for (const [event, json] of cases) expect(printer.formatEvent(event)).toBe(json);
  });

  test('commands have no JSON form', () => {
    expect(printer.formatEvent({ type: 'command', command: { type: 'status' } })).toBeUndefined();
    expect(printer.formatEvent({ type: 'command_queue', commands: [] })).toBeUndefined();
  });
});

test('round2 and createPrinter', () => {
  expect(round2(2.345678)).toBe(2.35);
  expect(createPrinter('json')).toBeInstanceOf(JsonPrinter);
  expect(createPrinter('text')).toBeInstanceOf(TextPrinter);
});
