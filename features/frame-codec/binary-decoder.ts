/**
 * Binary Decoder
 *
 * Decodes Progressor notification frames.
 *
 * Frame format (little-endian):
 *   [uint8 responseCode][uint8 reserved][payload...]
 *
 *   0 battery:   [uint32 raw]                    6 bytes
 *   1 weight:    [float32 value][uint32 counter] 10 bytes
 *   4 low power: (no payload)                    1 byte
 *
 * Unknown codes and truncated frames decode to null. The wire format may
 * grow or drop bytes, so nothing here throws.
 */

import { FrameLayout, ResponseCode, type ControlOpcode } from "@/constants/progressor";
import type { TelemetryFrame } from "./types";

// ============================================================================
// DECODING
// ============================================================================

export function decodeFrame(data: Uint8Array): TelemetryFrame | null {
  if (data.length === 0) return null;

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const payload = FrameLayout.HEADER_SIZE;

  switch (data[0]) {
    case ResponseCode.SAMPLE_BATTERY_VOLTAGE:
      if (data.length < FrameLayout.BATTERY_FRAME_SIZE) return null;
      return { type: "batteryVoltage", raw: view.getUint32(payload, true) };

    case ResponseCode.WEIGHT_MEASUREMENT:
      if (data.length < FrameLayout.WEIGHT_FRAME_SIZE) return null;
      return {
        type: "weightMeasurement",
        value: view.getFloat32(payload, true),
        counter: view.getUint32(payload + 4, true),
      };

    case ResponseCode.LOW_POWER_WARNING:
      return { type: "lowPowerWarning" };

    default:
      return null;
  }
}

// ============================================================================
// ENCODING
// ============================================================================

/**
 * Build a weight frame. The value is rounded to float32 on the wire.
 */
export function encodeWeightFrame(value: number, counter: number): Uint8Array {
  const out = new Uint8Array(FrameLayout.WEIGHT_FRAME_SIZE);
  const view = new DataView(out.buffer);
  out[0] = ResponseCode.WEIGHT_MEASUREMENT;
  view.setFloat32(FrameLayout.HEADER_SIZE, value, true);
  view.setUint32(FrameLayout.HEADER_SIZE + 4, counter >>> 0, true);
  return out;
}

export function encodeBatteryFrame(raw: number): Uint8Array {
  const out = new Uint8Array(FrameLayout.BATTERY_FRAME_SIZE);
  out[0] = ResponseCode.SAMPLE_BATTERY_VOLTAGE;
  new DataView(out.buffer).setUint32(FrameLayout.HEADER_SIZE, raw >>> 0, true);
  return out;
}

export function encodeLowPowerFrame(): Uint8Array {
  const out = new Uint8Array(FrameLayout.LOW_POWER_FRAME_SIZE);
  out[0] = ResponseCode.LOW_POWER_WARNING;
  return out;
}

/** `[opcode, 0x00]` */
export function encodeControlCommand(opcode: ControlOpcode): Uint8Array {
  const out = new Uint8Array(FrameLayout.CONTROL_COMMAND_SIZE);
  out[0] = opcode;
  return out;
}
