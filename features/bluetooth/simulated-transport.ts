/**
 * In-process Progressor.
 *
 * Implements the transport contract without a radio. Tests drive it by
 * hand (`notify`, `dropConnection`, failure options); with
 * `streamIntervalMs` set it plays back a slow pull-and-release profile
 * once measurement starts, for running the app without hardware.
 */

import { ControlOpcode, ProgressorUuids } from "@/constants/progressor";
import { encodeWeightFrame } from "@/features/frame-codec";

import type {
  AdapterState,
  BleCharacteristic,
  BlePeripheral,
  BleService,
  BleTransport,
  Unsubscribe,
} from "./transport";

export interface SimulatedProgressorOptions {
  adapterState?: AdapterState;
  /** Set false to never answer a scan */
  discoverable?: boolean;
  discoveryDelayMs?: number;
  /** The first N connect calls fail */
  connectFailures?: number;
  omitService?: boolean;
  omitCharacteristic?: "control" | "data";
  failSubscribe?: boolean;
  /** Control writes starting with this opcode fail */
  failWriteOpcode?: number;
  /** Emit synthetic weight frames at this interval after START */
  streamIntervalMs?: number;
  /** Peak of the synthetic pull profile in kg */
  peakWeight?: number;
}

const PROFILE_PERIOD_MS = 8_000;

class SimulatedCharacteristic implements BleCharacteristic {
  private readonly listeners = new Set<(data: Uint8Array) => void>();
  subscribed = false;

  constructor(
    readonly uuid: string,
    private readonly device: SimulatedProgressor,
  ) {}

  async subscribe(): Promise<void> {
    if (this.device.options.failSubscribe) throw new Error("CCCD write rejected");
    this.subscribed = true;
  }

  async write(data: Uint8Array, withResponse: boolean): Promise<void> {
    await this.device.handleControlWrite(Array.from(data), withResponse);
  }

  onNotification(listener: (data: Uint8Array) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  deliver(data: Uint8Array): void {
    if (!this.subscribed) return;
    this.listeners.forEach((fn) => fn(data));
  }
}

export class SimulatedProgressor implements BleTransport, BlePeripheral {
  readonly id = "sim-progressor";
  readonly name = "Progressor (simulated)";

  readonly options: SimulatedProgressorOptions;

  /** Control payloads in write order */
  readonly writes: number[][] = [];
  connectCalls = 0;
  disconnectCalls = 0;
  scanning = false;
  connected = false;

  private state: AdapterState;
  private readonly stateListeners = new Set<(state: AdapterState) => void>();
  private readonly disconnectListeners = new Set<() => void>();
  private readonly control: SimulatedCharacteristic;
  private readonly data: SimulatedCharacteristic;
  private discoveryTimer: ReturnType<typeof setTimeout> | null = null;
  private streamTimer: ReturnType<typeof setInterval> | null = null;
  private streamStartedAt = 0;

  constructor(options: SimulatedProgressorOptions = {}) {
    this.options = options;
    this.state = options.adapterState ?? "poweredOn";
    this.control = new SimulatedCharacteristic(ProgressorUuids.CONTROL, this);
    this.data = new SimulatedCharacteristic(ProgressorUuids.DATA, this);
  }

  // ============================================================================
  // CENTRAL
  // ============================================================================

  get adapterState(): AdapterState {
    return this.state;
  }

  setAdapterState(state: AdapterState): void {
    this.state = state;
    this.stateListeners.forEach((fn) => fn(state));
  }

  onAdapterStateChange(listener: (state: AdapterState) => void): Unsubscribe {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  async startScan(
    _serviceUuids: readonly string[],
    onDiscover: (peripheral: BlePeripheral) => void,
  ): Promise<void> {
    if (this.state !== "poweredOn") throw new Error(`Adapter is ${this.state}`);
    this.scanning = true;
    if (this.options.discoverable === false) return;
    this.discoveryTimer = setTimeout(() => {
      this.discoveryTimer = null;
      if (this.scanning) onDiscover(this);
    }, this.options.discoveryDelayMs ?? 0);
  }

  async stopScan(): Promise<void> {
    this.scanning = false;
    if (this.discoveryTimer) {
      clearTimeout(this.discoveryTimer);
      this.discoveryTimer = null;
    }
  }

  // ============================================================================
  // PERIPHERAL
  // ============================================================================

  async connect(): Promise<void> {
    this.connectCalls++;
    if (this.connectCalls <= (this.options.connectFailures ?? 0)) {
      throw new Error("Connection refused");
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.stopStreaming();
    this.connected = false;
  }

  async discoverServices(): Promise<readonly BleService[]> {
    if (this.options.omitService) return [];
    const characteristics: BleCharacteristic[] = [];
    if (this.options.omitCharacteristic !== "control") characteristics.push(this.control);
    if (this.options.omitCharacteristic !== "data") characteristics.push(this.data);
    return [{ uuid: ProgressorUuids.SERVICE, characteristics }];
  }

  onDisconnect(listener: () => void): Unsubscribe {
    this.disconnectListeners.add(listener);
    return () => this.disconnectListeners.delete(listener);
  }

  // ============================================================================
  // TEST HOOKS
  // ============================================================================

  /** Push a raw notification frame to the subscriber. */
  notify(frame: Uint8Array): void {
    this.data.deliver(frame);
  }

  /** Simulate the link dropping. */
  dropConnection(): void {
    this.stopStreaming();
    this.connected = false;
    this.disconnectListeners.forEach((fn) => fn());
  }

  get isSubscribed(): boolean {
    return this.data.subscribed;
  }

  opcodeWrites(opcode: number): number {
    return this.writes.filter((payload) => payload[0] === opcode).length;
  }

  // ============================================================================
  // FIRMWARE
  // ============================================================================

  async handleControlWrite(payload: number[], _withResponse: boolean): Promise<void> {
    if (!this.connected) throw new Error("Not connected");
    if (payload[0] === this.options.failWriteOpcode) throw new Error("Write rejected");
    this.writes.push(payload);

    if (payload[0] === ControlOpcode.START_WEIGHT_MEASUREMENT) this.startStreaming();
    if (payload[0] === ControlOpcode.END_WEIGHT_MEASUREMENT) this.stopStreaming();
  }

  private startStreaming(): void {
    const interval = this.options.streamIntervalMs;
    if (!interval || this.streamTimer) return;
    const peak = this.options.peakWeight ?? 10;
    this.streamStartedAt = Date.now();

    this.streamTimer = setInterval(() => {
      const elapsed = Date.now() - this.streamStartedAt;
      // 0 → peak → 0 over one period
      const weight = (peak / 2) * (1 - Math.cos((2 * Math.PI * elapsed) / PROFILE_PERIOD_MS));
      this.notify(encodeWeightFrame(weight, elapsed * 1000));
    }, interval);
  }

  private stopStreaming(): void {
    if (this.streamTimer) {
      clearInterval(this.streamTimer);
      this.streamTimer = null;
    }
  }
}
