/**
 * Phase-continuous sine oscillator.
 *
 * On a frequency change the sample clock restarts and the current phase
 * (mod 2π) becomes an offset, so the waveform carries on from where it
 * was instead of jumping back to phase zero.
 */

const TWO_PI = 2 * Math.PI;

export class PhaseContinuousOscillator {
  private clock = 0;
  private phase = 0;
  private phaseOffset = 0;
  private previousFrequency = 0;

  constructor(readonly sampleRate: number) {
    if (!(sampleRate > 0)) throw new RangeError(`Invalid sample rate: ${sampleRate}`);
  }

  /** Frequency applied to the most recent sample. */
  get frequency(): number {
    return this.previousFrequency;
  }

  nextSample(frequency: number): number {
    this.clock = (this.clock + 1) % this.sampleRate;
    if (frequency !== this.previousFrequency) {
      this.previousFrequency = frequency;
      this.clock = 1;
      this.phaseOffset = this.phase % TWO_PI;
    }
    this.phase = (this.clock * frequency * TWO_PI) / this.sampleRate + this.phaseOffset;
    return Math.sin(this.phase);
  }
}
