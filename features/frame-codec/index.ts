/**
 * Frame Codec Module
 *
 * Progressor notification frame decoding and test/simulator encoders.
 */

export type * from "./types";

export {
  decodeFrame,
  encodeWeightFrame,
  encodeBatteryFrame,
  encodeLowPowerFrame,
  encodeControlCommand,
} from "./binary-decoder";
