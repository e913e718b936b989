/**
 * Shared Weight Cell
 *
 * Single-slot holder for the latest known weight. The telemetry session
 * writes it, the audio render path reads it. There is no history: a read
 * always returns the most recently completed write.
 *
 * The value lives in a one-element Float32Array, so every access is a
 * single element load or store and a read can never see a partial value.
 * Stored values are rounded to float32, matching the wire precision.
 */

export interface WeightReader {
  read(): number;
}

export interface WeightWriter {
  write(weight: number): void;
}

export class SharedWeightCell implements WeightReader, WeightWriter {
  private readonly slot = new Float32Array(1);

  constructor(initial = 0) {
    this.slot[0] = initial;
  }

  read(): number {
    return this.slot[0];
  }

  write(weight: number): void {
    this.slot[0] = weight;
  }

  /** Read-only view handed to the audio engine. */
  reader(): WeightReader {
    return { read: () => this.slot[0] };
  }

  /** Write-only view handed to the telemetry session. */
  writer(): WeightWriter {
    return {
      write: (weight: number) => {
        this.slot[0] = weight;
      },
    };
  }
}
