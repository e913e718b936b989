export { SharedWeightCell, type WeightReader, type WeightWriter } from "./weight-cell";
export { RunningFlag } from "./running-flag";
