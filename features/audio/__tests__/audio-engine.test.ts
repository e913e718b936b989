import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { SimulatedProgressor } from "@/features/bluetooth/simulated-transport";
import { ProgressorSession, type ProgressorSessionEvent } from "@/features/bluetooth/progressor-session";
import type { SampleFormat } from "@/features/config/app-config";
import { ConfigurationError } from "@/features/errors";
import { encodeWeightFrame } from "@/features/frame-codec";
import { RunningFlag, SharedWeightCell } from "@/features/shared-state";

import { AudioEngine } from "../audio-engine";
import type { AudioOutputDevice, AudioStream, RenderCallback } from "../output-device";

/** Device that renders only when the test pulls a buffer. */
class ManualDevice implements AudioOutputDevice {
  readonly name = "manual";
  render: RenderCallback | null = null;
  started = 0;
  closed = 0;
  failStart = false;
  private errorHandler: ((error: Error) => void) | null = null;

  constructor(
    readonly sampleRate = 48_000,
    readonly channels = 2,
    readonly sampleFormat: SampleFormat = "f32",
  ) {}

  open(render: RenderCallback): AudioStream {
    this.render = render;
    return {
      start: async () => {
        if (this.failStart) throw new Error("device busy");
        this.started++;
      },
      close: async () => {
        this.closed++;
      },
      onError: (handler) => {
        this.errorHandler = handler;
      },
    };
  }

  pull(frames: number): Float32Array {
    const out = new Float32Array(frames * this.channels);
    this.render?.(out);
    return out;
  }

  raise(error: Error): void {
    this.errorHandler?.(error);
  }
}

function configurationErrorOf(fn: () => unknown): ConfigurationError | null {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e;
    throw e;
  }
  return null;
}

describe("AudioEngine", () => {
  beforeEach(() => {
    for (const level of ["debug", "info", "warn", "error"] as const) {
      vi.spyOn(console, level).mockImplementation(() => undefined);
    }
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("create", () => {
    it("fails without an output device", () => {
      const error = configurationErrorOf(() => AudioEngine.create(null, new SharedWeightCell()));
      expect(error?.code).toBe("NO_OUTPUT_DEVICE");
    });

    it.each<SampleFormat>(["s16", "u16"])("rejects %s output", (format) => {
      const device = new ManualDevice(44_100, 2, format);
      const error = configurationErrorOf(() => AudioEngine.create(device, new SharedWeightCell()));
      expect(error?.code).toBe("UNSUPPORTED_SAMPLE_FORMAT");
      expect(error?.message).toBe(
        `Unsupported sample format ${format} on manual (only f32 is supported)`,
      );
    });
  });

  describe("render", () => {
    it("writes the same sample to every channel of a frame", () => {
      const device = new ManualDevice(48_000, 3);
      const engine = AudioEngine.create(device, new SharedWeightCell());
      const out = new Float32Array(12);
      engine.render(out);

      const step = (2 * Math.PI * 110) / 48_000;
      for (let frame = 0; frame < 4; frame++) {
        expect(out[frame * 3]).toBeCloseTo(Math.sin((frame + 1) * step), 6);
        expect(out[frame * 3 + 1]).toBe(out[frame * 3]);
        expect(out[frame * 3 + 2]).toBe(out[frame * 3]);
      }
    });

    it("follows the shared weight", () => {
      const cell = new SharedWeightCell();
      const engine = AudioEngine.create(new ManualDevice(), cell.reader(), { baseFrequency: 100 });
      expect(engine.targetFrequency()).toBe(100);
      cell.write(4.2);
      expect(engine.targetFrequency()).toBe(500);
    });

    it("stays within [-1, 1]", () => {
      const cell = new SharedWeightCell();
      const device = new ManualDevice(8_000, 1);
      const engine = AudioEngine.create(device, cell.reader());
      const samples: number[] = [];
      for (const w of [0, 7.5, 2, 30]) {
        cell.write(w);
        const out = new Float32Array(500);
        engine.render(out);
        samples.push(...out);
      }
      expect(Math.max(...samples.map(Math.abs))).toBeLessThanOrEqual(1);
    });
  });

  describe("lifecycle", () => {
    it("opens the device once and closes it on stop", async () => {
      const device = new ManualDevice();
      const engine = AudioEngine.create(device, new SharedWeightCell());

      await engine.start();
      await engine.start();
      expect(engine.isPlaying).toBe(true);
      expect(device.started).toBe(1);

      await engine.stop();
      await engine.stop();
      expect(engine.isPlaying).toBe(false);
      expect(device.closed).toBe(1);
    });

    it("closes the stream when it fails to start", async () => {
      const device = new ManualDevice();
      device.failStart = true;
      const engine = AudioEngine.create(device, new SharedWeightCell());

      await expect(engine.start()).rejects.toThrow("device busy");
      expect(engine.isPlaying).toBe(false);
      expect(device.closed).toBe(1);
    });

    it("logs stream errors without stopping", async () => {
      const device = new ManualDevice();
      const engine = AudioEngine.create(device, new SharedWeightCell());
      await engine.start();

      device.raise(new Error("underrun"));
      expect(engine.isPlaying).toBe(true);
      expect(console.error).toHaveBeenCalledTimes(1);
      await engine.stop();
    });
  });

  describe("with a session", () => {
    it("maps streamed weights onto the tone", async () => {
      const progressor = new SimulatedProgressor();
      const session = new ProgressorSession(progressor, {
        scanTimeoutMs: 200,
        operationTimeoutMs: 200,
      });
      const cell = new SharedWeightCell();
      const flag = new RunningFlag();
      const device = new ManualDevice();
      const engine = AudioEngine.create(device, cell.reader());
      await engine.start();

      const waitFor = (predicate: (e: ProgressorSessionEvent) => boolean) =>
        new Promise<void>((resolve) => {
          const off = session.addEventListener((e) => {
            if (predicate(e)) {
              off();
              resolve();
            }
          });
        });

      const streaming = waitFor((e) => e.type === "stateChanged" && e.state === "streaming");
      const run = session.run(flag, cell.writer());
      await streaming;
      expect(engine.targetFrequency()).toBe(110);

      const cases: [number, number][] = [
        [0.0, 110],
        [1.2, 220],
        [3.9, 440],
      ];
      let counter = 0;
      for (const [weight, frequency] of cases) {
        const received = waitFor((e) => e.type === "weight");
        progressor.notify(encodeWeightFrame(weight, counter++));
        await received;
        expect(engine.targetFrequency()).toBe(frequency);
        device.pull(64);
      }

      flag.stop();
      progressor.notify(encodeWeightFrame(0, counter));
      await run;
      await engine.stop();

      expect(session.getState().state).toBe("disconnected");
      expect(device.closed).toBe(1);
    });
  });
});
