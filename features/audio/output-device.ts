import type { SampleFormat } from "@/features/config/app-config";

/**
 * Fills an interleaved float32 buffer (`frames * channels` samples).
 * Called on the device's clock and must not block.
 */
export type RenderCallback = (out: Float32Array) => void;

export interface AudioStream {
  /** Resolves once the device is accepting samples. */
  start(): Promise<void>;
  close(): Promise<void>;
  onError(handler: (error: Error) => void): void;
}

/**
 * An output device as negotiated with the backend: fixed rate, channel
 * count and sample format, pulling samples through a render callback.
 */
export interface AudioOutputDevice {
  readonly name: string;
  readonly sampleRate: number;
  readonly channels: number;
  readonly sampleFormat: SampleFormat;
  open(render: RenderCallback): AudioStream;
}
