/**
 * BLE transport backed by @abandonware/noble.
 *
 * Loading noble opens the HCI socket / system Bluetooth binding, so this
 * module is only imported when a real sensor is wanted.
 */

import noble from "@abandonware/noble";
import type {
  Characteristic as NobleCharacteristic,
  Peripheral as NoblePeripheral,
  Service as NobleService,
} from "@abandonware/noble";

import {
  normalizeUuid,
  toAdapterState,
  type AdapterState,
  type BleCharacteristic,
  type BlePeripheral,
  type BleService,
  type BleTransport,
  type Unsubscribe,
} from "./transport";

class NobleCharacteristicAdapter implements BleCharacteristic {
  constructor(private readonly characteristic: NobleCharacteristic) {}

  get uuid(): string {
    return this.characteristic.uuid;
  }

  subscribe(): Promise<void> {
    return this.characteristic.subscribeAsync();
  }

  write(data: Uint8Array, withResponse: boolean): Promise<void> {
    return this.characteristic.writeAsync(Buffer.from(data), !withResponse);
  }

  onNotification(listener: (data: Uint8Array) => void): Unsubscribe {
    const onData = (data: Buffer, isNotification: boolean) => {
      if (isNotification) listener(new Uint8Array(data));
    };
    this.characteristic.on("data", onData);
    return () => {
      this.characteristic.removeListener("data", onData);
    };
  }
}

class NoblePeripheralAdapter implements BlePeripheral {
  constructor(private readonly peripheral: NoblePeripheral) {}

  get id(): string {
    return this.peripheral.id;
  }

  get name(): string {
    return this.peripheral.advertisement?.localName || "Progressor";
  }

  connect(): Promise<void> {
    return this.peripheral.connectAsync();
  }

  disconnect(): Promise<void> {
    return this.peripheral.disconnectAsync();
  }

  async discoverServices(
    serviceUuids: readonly string[],
    characteristicUuids: readonly string[],
  ): Promise<readonly BleService[]> {
    const { services } = await this.peripheral.discoverSomeServicesAndCharacteristicsAsync(
      serviceUuids.map(normalizeUuid),
      characteristicUuids.map(normalizeUuid),
    );
    return services.map((service: NobleService) => ({
      uuid: service.uuid,
      characteristics: (service.characteristics ?? []).map(
        (c: NobleCharacteristic) => new NobleCharacteristicAdapter(c),
      ),
    }));
  }

  onDisconnect(listener: () => void): Unsubscribe {
    const onDisconnect = () => listener();
    this.peripheral.once("disconnect", onDisconnect);
    return () => {
      this.peripheral.removeListener("disconnect", onDisconnect);
    };
  }
}

export class NobleTransport implements BleTransport {
  private discoverListener: ((peripheral: NoblePeripheral) => void) | null = null;

  get adapterState(): AdapterState {
    return toAdapterState(noble._state);
  }

  onAdapterStateChange(listener: (state: AdapterState) => void): Unsubscribe {
    const onStateChange = (state: string) => listener(toAdapterState(state));
    noble.on("stateChange", onStateChange);
    return () => {
      noble.removeListener("stateChange", onStateChange);
    };
  }

  async startScan(
    serviceUuids: readonly string[],
    onDiscover: (peripheral: BlePeripheral) => void,
  ): Promise<void> {
    this.detachDiscover();
    const listener = (peripheral: NoblePeripheral) =>
      onDiscover(new NoblePeripheralAdapter(peripheral));
    this.discoverListener = listener;
    noble.on("discover", listener);
    await noble.startScanningAsync(serviceUuids.map(normalizeUuid), false);
  }

  async stopScan(): Promise<void> {
    this.detachDiscover();
    await noble.stopScanningAsync();
  }

  private detachDiscover(): void {
    if (this.discoverListener) {
      noble.removeListener("discover", this.discoverListener);
      this.discoverListener = null;
    }
  }
}
