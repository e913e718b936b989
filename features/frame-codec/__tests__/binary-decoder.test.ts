import { describe, it, expect } from "vitest";
import {
  decodeFrame,
  encodeWeightFrame,
  encodeBatteryFrame,
  encodeLowPowerFrame,
  encodeControlCommand,
} from "../binary-decoder";
import { ControlOpcode } from "@/constants/progressor";

describe("decodeFrame", () => {
  it("decodes a weight frame", () => {
    // 12.5 kg = 0x41480000, counter 0x01020304
    const data = Uint8Array.of(1, 0, 0x00, 0x00, 0x48, 0x41, 0x04, 0x03, 0x02, 0x01);
    expect(decodeFrame(data)).toEqual({
      type: "weightMeasurement",
      value: 12.5,
      counter: 0x01020304,
    });
  });

  it("recovers the encoded float and counter", () => {
    const frame = decodeFrame(encodeWeightFrame(1.2, 4_000_000_000));
    expect(frame).toEqual({
      type: "weightMeasurement",
      value: Math.fround(1.2),
      counter: 4_000_000_000,
    });
  });

  it("decodes negative weights", () => {
    const frame = decodeFrame(encodeWeightFrame(-0.75, 3));
    expect(frame).toEqual({ type: "weightMeasurement", value: -0.75, counter: 3 });
  });

  it("ignores bytes past the weight payload", () => {
    const data = new Uint8Array(14);
    data.set(encodeWeightFrame(2.25, 9));
    data.fill(0xff, 10);
    expect(decodeFrame(data)).toEqual({ type: "weightMeasurement", value: 2.25, counter: 9 });
  });

  it("decodes a battery frame", () => {
    const data = Uint8Array.of(0, 0, 0xe8, 0x0f, 0x00, 0x00);
    expect(decodeFrame(data)).toEqual({ type: "batteryVoltage", raw: 4072 });
  });

  it("decodes a low power warning with no payload", () => {
    expect(decodeFrame(Uint8Array.of(4))).toEqual({ type: "lowPowerWarning" });
    expect(decodeFrame(Uint8Array.of(4, 0, 1, 2))).toEqual({ type: "lowPowerWarning" });
  });

  it("returns null for an empty buffer", () => {
    expect(decodeFrame(new Uint8Array(0))).toBeNull();
  });

  it("returns null for unknown response codes", () => {
    for (const code of [2, 3, 5, 0x65, 0xff]) {
      expect(decodeFrame(Uint8Array.of(code, 0, 0, 0, 0, 0, 0, 0, 0, 0))).toBeNull();
    }
  });

  it("returns null for truncated weight frames of every length", () => {
    for (let len = 0; len < 10; len++) {
      const data = new Uint8Array(len);
      if (len > 0) data[0] = 1;
      expect(decodeFrame(data)).toBeNull();
    }
  });

  it("returns null for truncated battery frames", () => {
    for (let len = 1; len < 6; len++) {
      const data = new Uint8Array(len);
      expect(decodeFrame(data)).toBeNull();
    }
  });

  it("reads frames from a view into a larger buffer", () => {
    const backing = new Uint8Array(32);
    backing.set(encodeWeightFrame(7.5, 42), 11);
    const view = backing.subarray(11, 21);
    expect(decodeFrame(view)).toEqual({ type: "weightMeasurement", value: 7.5, counter: 42 });
  });

  it("never throws on arbitrary bytes", () => {
    let seed = 12345;
    const next = () => {
      seed = (seed * 1103515245 + 12345) & 0x7fffffff;
      return seed;
    };
    for (let i = 0; i < 500; i++) {
      const data = new Uint8Array(next() % 16);
      for (let j = 0; j < data.length; j++) data[j] = next() & 0xff;
      expect(() => decodeFrame(data)).not.toThrow();
    }
  });
});

describe("encoders", () => {
  it("builds 2-byte control commands", () => {
    expect(Array.from(encodeControlCommand(ControlOpcode.START_WEIGHT_MEASUREMENT))).toEqual([0x65, 0]);
    expect(Array.from(encodeControlCommand(ControlOpcode.END_WEIGHT_MEASUREMENT))).toEqual([0x66, 0]);
  });

  it("builds battery and low power frames", () => {
    expect(Array.from(encodeBatteryFrame(4072))).toEqual([0, 0, 0xe8, 0x0f, 0, 0]);
    expect(Array.from(encodeLowPowerFrame())).toEqual([4]);
  });
});
