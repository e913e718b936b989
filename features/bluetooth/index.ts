export {
  ProgressorSession,
  type DiscoveredDevice,
  type ProgressorSessionEvent,
  type ProgressorSessionListener,
  type ProgressorSessionState,
  type SessionState,
} from "./progressor-session";
export { SimulatedProgressor, type SimulatedProgressorOptions } from "./simulated-transport";
export type {
  AdapterState,
  BleCharacteristic,
  BlePeripheral,
  BleService,
  BleTransport,
  Unsubscribe,
} from "./transport";
