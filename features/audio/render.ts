import type { WeightReader } from "@/features/shared-state";

import { weightToFrequency } from "./frequency-mapper";
import type { PhaseContinuousOscillator } from "./oscillator";

/**
 * Fill an interleaved buffer. Runs on the output deadline: arithmetic and
 * one cell read per frame, nothing else.
 */
export function renderInterleaved(
  out: Float32Array,
  channels: number,
  oscillator: PhaseContinuousOscillator,
  weight: WeightReader,
  baseFrequency: number,
): void {
  const frames = Math.floor(out.length / channels);
  for (let frame = 0; frame < frames; frame++) {
    const sample = oscillator.nextSample(weightToFrequency(weight.read(), baseFrequency));
    const base = frame * channels;
    for (let ch = 0; ch < channels; ch++) {
      out[base + ch] = sample;
    }
  }
}
