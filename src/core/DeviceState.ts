import { ColorimeterEvent, DeviceState } from '../types';

export function createDeviceState(): DeviceState {
  return { connected: false, connecting: false };
}

/**
 * Fold one bus event into the aggregated state; returns a new object when anything changed
 */
export function foldDeviceState(state: DeviceState, event: ColorimeterEvent, now: () => Date = () => new Date()): DeviceState {
  switch (event.type) {
    case 'connecting':
      return { ...state, connecting: true, connected: false, deviceAddress: event.address, deviceName: event.name };
    case 'connected':
      return { ...state, connecting: false, connected: true, deviceAddress: event.address, deviceName: event.name };
    case 'disconnected':
      return { ...state, connected: false, connecting: false };
    case 'power_level':
      return { ...state, powerLevel: event.value };
    case 'device_info':
      return { ...state, deviceInfoRaw: [...event.values] };
    case 'calibrated':
      return { ...state, calibratedAt: now() };
    default:
      return state;
  }
}
