/**
 * Progressor telemetry session.
 *
 * Drives one linear pass over the BLE lifecycle:
 *
 *   idle → scanning → connecting → discoveringServices → subscribing
 *        → streaming → unsubscribing → disconnected
 *
 * Any failure ends in "error" after a best-effort teardown (end-measurement
 * command, disconnect). Weight frames overwrite the shared weight cell;
 * battery and low-power frames are only reported as events.
 *
 * A session runs once. Create a new one to reconnect.
 */

import { ControlOpcode, ProgressorUuids } from "@/constants/progressor";
import { DEFAULT_CONFIG, type SessionConfig } from "@/features/config/app-config";
import {
  SessionError,
  asSessionError,
  errorMessage,
  toErrorRecord,
  type ErrorRecord,
} from "@/features/errors";
import { decodeFrame, encodeControlCommand } from "@/features/frame-codec";
import { getLogger } from "@/features/logging/logger";
import type { RunningFlag, WeightWriter } from "@/features/shared-state";

import { backoffDelay, delay, withTimeout } from "./async-utils";
import { NotificationQueue } from "./notification-queue";
import {
  isTerminalAdapterState,
  sameUuid,
  type AdapterState,
  type BleCharacteristic,
  type BlePeripheral,
  type BleTransport,
  type Unsubscribe,
} from "./transport";

// ============================================================================
// TYPES
// ============================================================================

export type SessionState =
  | "idle"
  | "scanning"
  | "connecting"
  | "discoveringServices"
  | "subscribing"
  | "streaming"
  | "unsubscribing"
  | "disconnected"
  | "error";

export interface DiscoveredDevice {
  id: string;
  name: string;
}

export interface ProgressorSessionState {
  state: SessionState;
  device: DiscoveredDevice | null;
  lastWeight: number | null;
  lastCounter: number | null;
  batteryRaw: number | null;
  lowPowerWarning: boolean;
  framesReceived: number;
  lastError: ErrorRecord | null;
}

export type ProgressorSessionEvent =
  | { type: "stateChanged"; state: SessionState; previous: SessionState }
  | { type: "deviceDiscovered"; device: DiscoveredDevice }
  | { type: "weight"; value: number; counter: number }
  | { type: "battery"; raw: number }
  | { type: "lowPowerWarning" }
  | { type: "error"; error: ErrorRecord };

export type ProgressorSessionListener = (event: ProgressorSessionEvent) => void;

interface ResolvedCharacteristics {
  control: BleCharacteristic;
  data: BleCharacteristic;
}

const log = getLogger("BLE");

// ============================================================================
// SESSION
// ============================================================================

export class ProgressorSession {
  private readonly config: SessionConfig;
  private readonly listeners = new Set<ProgressorSessionListener>();

  private state: ProgressorSessionState = {
    state: "idle",
    device: null,
    lastWeight: null,
    lastCounter: null,
    batteryRaw: null,
    lowPowerWarning: false,
    framesReceived: 0,
    lastError: null,
  };

  constructor(
    private readonly transport: BleTransport,
    config: Partial<SessionConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG.session, ...config };
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  getState(): ProgressorSessionState {
    return { ...this.state };
  }

  addEventListener(listener: ProgressorSessionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(event: ProgressorSessionEvent): void {
    this.listeners.forEach((fn) => {
      try {
        fn(event);
      } catch (e) {
        log.error("Event listener error", { error: errorMessage(e) });
      }
    });
  }

  private transition(next: SessionState): void {
    const previous = this.state.state;
    if (previous === next) return;
    this.state.state = next;
    log.debug(`${previous} → ${next}`);
    this.emit({ type: "stateChanged", state: next, previous });
  }

  // ============================================================================
  // RUN
  // ============================================================================

  /**
   * Run the session to completion. Resolves after a clean disconnect,
   * including when `running` is cleared before a device is found. Rejects
   * with a SessionError once teardown has been attempted.
   */
  async run(running: RunningFlag, weightOut: WeightWriter): Promise<void> {
    if (this.state.state !== "idle") {
      throw new Error(`Session already ran (state: ${this.state.state})`);
    }

    let peripheral: BlePeripheral | null = null;
    let connectStarted = false;
    let control: BleCharacteristic | null = null;
    let measuring = false;
    let failure: SessionError | null = null;

    const queue = new NotificationQueue();
    const subscriptions: Unsubscribe[] = [];

    try {
      await this.waitForAdapter(running);
      if (!running.isRunning()) {
        log.info("Stopped before scanning");
        this.transition("disconnected");
        return;
      }

      this.transition("scanning");
      peripheral = await this.scan(running);
      if (!peripheral) {
        log.info("Stopped while scanning");
        this.transition("disconnected");
        return;
      }

      this.transition("connecting");
      connectStarted = true;
      if (!(await this.connect(peripheral, running))) {
        log.info("Stopped while waiting to reconnect");
        this.transition("disconnected");
        return;
      }
      subscriptions.push(
        peripheral.onDisconnect(() =>
          queue.fail(new SessionError("STREAM_FAILED", "Device disconnected")),
        ),
      );

      this.transition("discoveringServices");
      const characteristics = await this.resolveCharacteristics(peripheral);
      control = characteristics.control;

      this.transition("subscribing");
      subscriptions.push(characteristics.data.onNotification((bytes) => queue.push(bytes)));
      measuring = true;
      await this.guard(characteristics.data.subscribe(), "SUBSCRIBE_FAILED", "Subscribe to data");
      await this.writeCommand(control, ControlOpcode.START_WEIGHT_MEASUREMENT, "Start measurement");
      log.info("Measurement started");

      this.transition("streaming");
      await this.stream(queue, running, weightOut);
    } catch (error) {
      failure = asSessionError("STREAM_FAILED", "Session failed", error);
      this.reportError(failure);
    } finally {
      subscriptions.forEach((unsubscribe) => unsubscribe());
      queue.close();
    }

    await this.teardown(peripheral, connectStarted, measuring ? control : null, failure === null);

    if (failure) {
      this.transition("error");
      throw failure;
    }
    this.transition("disconnected");
  }

  // ============================================================================
  // ADAPTER
  // ============================================================================

  private waitForAdapter(running: RunningFlag): Promise<void> {
    const current = this.transport.adapterState;
    if (current === "poweredOn" || !running.isRunning()) return Promise.resolve();
    if (isTerminalAdapterState(current)) {
      return Promise.reject(
        new SessionError("ADAPTER_UNAVAILABLE", `Bluetooth adapter is ${current}`),
      );
    }

    log.info(`Waiting for Bluetooth adapter (state: ${current})`);
    const timeoutMs = this.config.scanTimeoutMs;

    return new Promise<void>((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;
      let unsubscribe: Unsubscribe = () => undefined;

      const finish = (error?: SessionError) => {
        clearTimeout(timeoutId);
        unsubscribe();
        running.signal.removeEventListener("abort", onAbort);
        if (error) reject(error);
        else resolve();
      };
      const onAbort = () => finish();

      unsubscribe = this.transport.onAdapterStateChange((state: AdapterState) => {
        if (state === "poweredOn") finish();
        else if (isTerminalAdapterState(state)) {
          finish(new SessionError("ADAPTER_UNAVAILABLE", `Bluetooth adapter is ${state}`));
        }
      });
      running.signal.addEventListener("abort", onAbort, { once: true });
      if (timeoutMs > 0) {
        timeoutId = setTimeout(
          () =>
            finish(
              new SessionError(
                "ADAPTER_UNAVAILABLE",
                `Bluetooth adapter not powered on after ${timeoutMs}ms (state: ${this.transport.adapterState})`,
              ),
            ),
          timeoutMs,
        );
      }
    });
  }

  // ============================================================================
  // SCANNING
  // ============================================================================

  /**
   * Resolve the first device advertising the Progressor service, or null
   * if `running` clears first. Multiple matches are not disambiguated.
   */
  private scan(running: RunningFlag): Promise<BlePeripheral | null> {
    const timeoutMs = this.config.scanTimeoutMs;
    log.info("Scanning...");

    return new Promise<BlePeripheral | null>((resolve, reject) => {
      let settled = false;
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const finish = (result: { peripheral: BlePeripheral | null } | { error: SessionError }) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        running.signal.removeEventListener("abort", onAbort);
        withTimeout(this.transport.stopScan(), this.config.operationTimeoutMs, "Stop scan")
          .catch((e: unknown) => log.warn("Failed to stop scan", { error: errorMessage(e) }))
          .finally(() => {
            if ("error" in result) reject(result.error);
            else resolve(result.peripheral);
          });
      };
      const onAbort = () => finish({ peripheral: null });

      const onDiscover = (peripheral: BlePeripheral) => {
        if (settled) return;
        const device = { id: peripheral.id, name: peripheral.name };
        this.state.device = device;
        log.info(`Found: ${device.name} (${device.id})`);
        this.emit({ type: "deviceDiscovered", device });
        finish({ peripheral });
      };

      running.signal.addEventListener("abort", onAbort, { once: true });
      if (running.signal.aborted) {
        onAbort();
        return;
      }
      if (timeoutMs > 0) {
        timeoutId = setTimeout(
          () =>
            finish({
              error: new SessionError(
                "DEVICE_NOT_FOUND",
                `No Progressor found within ${timeoutMs}ms`,
              ),
            }),
          timeoutMs,
        );
      }

      this.transport.startScan([ProgressorUuids.SERVICE], onDiscover).catch((e: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        running.signal.removeEventListener("abort", onAbort);
        reject(asSessionError("ADAPTER_UNAVAILABLE", "Start scan", e));
      });
    });
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  /** Resolves false if `running` clears during a retry backoff. */
  private async connect(peripheral: BlePeripheral, running: RunningFlag): Promise<boolean> {
    const attempts = this.config.connectAttempts;

    for (let attempt = 1; ; attempt++) {
      log.info(`Connecting to ${peripheral.name} (attempt ${attempt}/${attempts})...`);
      try {
        await this.guard(peripheral.connect(), "CONNECTION_FAILED", "Connect");
        log.info(`Connected to ${peripheral.name}`);
        return true;
      } catch (error) {
        if (attempt >= attempts || !running.isRunning()) throw error;
        const wait = backoffDelay(
          attempt,
          this.config.reconnectBaseDelayMs,
          this.config.reconnectMaxDelayMs,
        );
        log.warn(`Connect attempt ${attempt} failed, retrying in ${wait}ms`, {
          error: errorMessage(error),
        });
        await delay(wait, running.signal);
        if (!running.isRunning()) return false;
      }
    }
  }

  private async resolveCharacteristics(
    peripheral: BlePeripheral,
  ): Promise<ResolvedCharacteristics> {
    const services = await this.guard(
      peripheral.discoverServices(
        [ProgressorUuids.SERVICE],
        [ProgressorUuids.CONTROL, ProgressorUuids.DATA],
      ),
      "SERVICE_NOT_FOUND",
      "Discover services",
    );

    const service = services.find((s) => sameUuid(s.uuid, ProgressorUuids.SERVICE));
    if (!service) throw new SessionError("SERVICE_NOT_FOUND", "Progressor service not found");

    const control = service.characteristics.find((c) => sameUuid(c.uuid, ProgressorUuids.CONTROL));
    if (!control) {
      throw new SessionError("CHARACTERISTIC_NOT_FOUND", "Control characteristic not found");
    }
    const data = service.characteristics.find((c) => sameUuid(c.uuid, ProgressorUuids.DATA));
    if (!data) {
      throw new SessionError("CHARACTERISTIC_NOT_FOUND", "Data characteristic not found");
    }

    return { control, data };
  }

  // ============================================================================
  // STREAMING
  // ============================================================================

  /**
   * Consume notifications until the queue ends or `running` clears. The
   * flag is checked before each item; its signal also ends a pending wait.
   */
  private async stream(
    queue: NotificationQueue,
    running: RunningFlag,
    weightOut: WeightWriter,
  ): Promise<void> {
    for (;;) {
      if (!running.isRunning()) break;
      const bytes = await queue.next(running.signal);
      if (bytes === null) break;
      if (!running.isRunning()) break;
      this.handleNotification(bytes, weightOut);
    }
    log.info(running.isRunning() ? "Notification stream ended" : "Stop requested");
  }

  private handleNotification(bytes: Uint8Array, weightOut: WeightWriter): void {
    const frame = decodeFrame(bytes);
    if (!frame) return;

    this.state.framesReceived++;
    switch (frame.type) {
      case "weightMeasurement":
        weightOut.write(frame.value);
        this.state.lastWeight = frame.value;
        this.state.lastCounter = frame.counter;
        this.emit({ type: "weight", value: frame.value, counter: frame.counter });
        break;
      case "batteryVoltage":
        this.state.batteryRaw = frame.raw;
        log.debug(`Battery: ${frame.raw}`);
        this.emit({ type: "battery", raw: frame.raw });
        break;
      case "lowPowerWarning":
        if (!this.state.lowPowerWarning) log.warn("Device reports low power");
        this.state.lowPowerWarning = true;
        this.emit({ type: "lowPowerWarning" });
        break;
    }
  }

  // ============================================================================
  // TEARDOWN
  // ============================================================================

  private async teardown(
    peripheral: BlePeripheral | null,
    connectStarted: boolean,
    control: BleCharacteristic | null,
    clean: boolean,
  ): Promise<void> {
    if (clean) this.transition("unsubscribing");

    if (control) {
      try {
        await this.writeCommand(control, ControlOpcode.END_WEIGHT_MEASUREMENT, "End measurement");
        log.info("Measurement ended");
      } catch (error) {
        log.warn("Failed to end measurement", { error: errorMessage(error) });
      }
    }

    if (peripheral && connectStarted) {
      log.info("Disconnecting...");
      try {
        await withTimeout(peripheral.disconnect(), this.config.operationTimeoutMs, "Disconnect");
        log.info("Disconnected");
      } catch (error) {
        log.warn("Failed to disconnect", { error: errorMessage(error) });
      }
    }
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private writeCommand(
    control: BleCharacteristic,
    opcode: ControlOpcode,
    label: string,
  ): Promise<void> {
    return this.guard(control.write(encodeControlCommand(opcode), true), "WRITE_FAILED", label);
  }

  /**
   * Bound an operation by the configured timeout and map failures to a
   * session error code. Timeouts keep the TIMEOUT code.
   */
  private async guard<T>(
    operation: Promise<T>,
    code: SessionError["code"],
    label: string,
  ): Promise<T> {
    try {
      return await withTimeout(operation, this.config.operationTimeoutMs, label);
    } catch (error) {
      throw asSessionError(code, label, error);
    }
  }

  private reportError(error: SessionError): void {
    const record = toErrorRecord(error);
    this.state.lastError = record;
    this.emit({ type: "error", error: record });
    log.error(`Error: ${record.code}: ${record.message}`);
  }
}
