// Export types (events, commands, session phases and options)
export * from './types';

// Session engine
export { EventBus, BusSubscription, BusMessage, DEFAULT_BUS_CAPACITY } from './core/EventBus';
export { CommandQueue } from './core/CommandQueue';
export { DeviceSession } from './core/DeviceSession';
export { Supervisor, SessionFactory, SessionRunner } from './core/Supervisor';
export { createDeviceState, foldDeviceState } from './core/DeviceState';

// Wire format
export {
  Gatt,
  Sizes,
  FRAME_SENTINEL,
  ScanPacket,
  PowerPacket,
  InfoPacket,
  CalibratedPacket,
  Notification,
  decodeNotification,
  encodeCommand,
  framesForCommand
} from './core/ColorPackets';

// Bluetooth transports
export { BleCentral, BleDevice, BleCharacteristic, DeviceFilter } from './transport/BleCentral';
export { NobleCentral } from './transport/NobleCentral';
export { SimulatedCentral, SimulatedDevice, SimulatedDeviceOptions } from './transport/SimulatedCentral';

// Consumers
export { TextPrinter, JsonPrinter, OutputPrinter, createPrinter } from './output/printers';
export { runLogLoop } from './output/logLoop';
export { InteractiveConsole } from './console/InteractiveConsole';
export { BroadcastServer, parseClientMessage, stateMessage } from './server/BroadcastServer';

// Configuration and errors
export { ColorimeterConfig, parseConfig } from './config';
export {
  ColorimeterError,
  TransportError,
  TimeoutError,
  CharacteristicMissingError,
  ErrorKind,
  getDisconnectMessage
} from './utils/errors';
export { LogLevel, setLogLevel, getLogLevel } from './utils/debug';

// Export error handling utilities (optional, for long-running hosts)
export { setupGlobalErrorHandlers, GlobalErrorHandlerOptions } from './utils/errorHandling';
