/**
 * Audio Engine
 *
 * Binds the oscillator to an output device. The device pulls buffers
 * through `render`; each frame reads the shared weight once and maps it to
 * a tone. Playback runs from `start` until `stop` at teardown.
 */

import { ConfigurationError, errorMessage } from "@/features/errors";
import { getLogger } from "@/features/logging/logger";
import type { WeightReader } from "@/features/shared-state";

import { BASE_FREQUENCY_HZ, weightToFrequency } from "./frequency-mapper";
import { PhaseContinuousOscillator } from "./oscillator";
import type { AudioOutputDevice, AudioStream } from "./output-device";
import { renderInterleaved } from "./render";

export interface AudioEngineOptions {
  baseFrequency?: number;
}

const log = getLogger("audio");

export class AudioEngine {
  private readonly oscillator: PhaseContinuousOscillator;
  private readonly baseFrequency: number;
  private stream: AudioStream | null = null;

  /**
   * @throws ConfigurationError NO_OUTPUT_DEVICE without a device,
   *   UNSUPPORTED_SAMPLE_FORMAT for anything but 32-bit float.
   */
  static create(
    device: AudioOutputDevice | null,
    weight: WeightReader,
    options: AudioEngineOptions = {},
  ): AudioEngine {
    if (!device) {
      throw new ConfigurationError("NO_OUTPUT_DEVICE", "No audio output device available");
    }
    if (device.sampleFormat !== "f32") {
      throw new ConfigurationError(
        "UNSUPPORTED_SAMPLE_FORMAT",
        `Unsupported sample format ${device.sampleFormat} on ${device.name} (only f32 is supported)`,
      );
    }
    return new AudioEngine(device, weight, options.baseFrequency ?? BASE_FREQUENCY_HZ);
  }

  private constructor(
    private readonly device: AudioOutputDevice,
    private readonly weight: WeightReader,
    baseFrequency: number,
  ) {
    this.oscillator = new PhaseContinuousOscillator(device.sampleRate);
    this.baseFrequency = baseFrequency;
  }

  get isPlaying(): boolean {
    return this.stream !== null;
  }

  /** Frequency the next rendered frame will use. */
  targetFrequency(): number {
    return weightToFrequency(this.weight.read(), this.baseFrequency);
  }

  render = (out: Float32Array): void => {
    renderInterleaved(out, this.device.channels, this.oscillator, this.weight, this.baseFrequency);
  };

  async start(): Promise<void> {
    if (this.stream) return;
    const stream = this.device.open(this.render);
    stream.onError((error) => log.error("Stream error", { error: errorMessage(error) }));
    try {
      await stream.start();
    } catch (error) {
      await stream
        .close()
        .catch((e: unknown) => log.warn("Failed to close stream", { error: errorMessage(e) }));
      throw error;
    }
    this.stream = stream;
    log.info(
      `Playing on ${this.device.name} (${this.device.sampleRate} Hz, ${this.device.channels} ch)`,
    );
  }

  async stop(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    await stream.close();
    log.info("Playback stopped");
  }
}
