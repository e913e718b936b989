/**
 * BLE transport contract.
 *
 * The session only needs a central that can scan by service, and a
 * peripheral exposing a write target and a notification source. Radio
 * management and GATT mechanics stay behind these interfaces.
 */

export type AdapterState =
  | "unknown"
  | "resetting"
  | "unsupported"
  | "unauthorized"
  | "poweredOff"
  | "poweredOn";

export type Unsubscribe = () => void;

export interface BleCharacteristic {
  readonly uuid: string;
  subscribe(): Promise<void>;
  write(data: Uint8Array, withResponse: boolean): Promise<void>;
  onNotification(listener: (data: Uint8Array) => void): Unsubscribe;
}

export interface BleService {
  readonly uuid: string;
  readonly characteristics: readonly BleCharacteristic[];
}

export interface BlePeripheral {
  readonly id: string;
  readonly name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  discoverServices(
    serviceUuids: readonly string[],
    characteristicUuids: readonly string[],
  ): Promise<readonly BleService[]>;
  onDisconnect(listener: () => void): Unsubscribe;
}

export interface BleTransport {
  readonly adapterState: AdapterState;
  onAdapterStateChange(listener: (state: AdapterState) => void): Unsubscribe;
  startScan(
    serviceUuids: readonly string[],
    onDiscover: (peripheral: BlePeripheral) => void,
  ): Promise<void>;
  stopScan(): Promise<void>;
}

/**
 * Canonical UUID form for comparisons: lowercase, no dashes.
 */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, "").toLowerCase();
}

export function sameUuid(a: string, b: string): boolean {
  return normalizeUuid(a) === normalizeUuid(b);
}

const ADAPTER_STATES: readonly AdapterState[] = [
  "unknown",
  "resetting",
  "unsupported",
  "unauthorized",
  "poweredOff",
  "poweredOn",
];

export function toAdapterState(raw: string): AdapterState {
  return ADAPTER_STATES.find((s) => s === raw) ?? "unknown";
}

/** States the adapter cannot recover from without user action. */
export function isTerminalAdapterState(state: AdapterState): boolean {
  return state === "unsupported" || state === "unauthorized";
}
