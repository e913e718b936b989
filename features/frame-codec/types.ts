/**
 * Telemetry frame types decoded from Progressor notifications.
 */

export interface WeightSample {
  /** Weight in signal units (kg), float32 precision */
  readonly value: number;
  /** Device-relative uint32, non-decreasing within a session */
  readonly counter: number;
}

export type TelemetryFrame =
  | ({ readonly type: "weightMeasurement" } & WeightSample)
  | { readonly type: "batteryVoltage"; readonly raw: number }
  | { readonly type: "lowPowerWarning" };
