export { AudioEngine, type AudioEngineOptions } from "./audio-engine";
export { BASE_FREQUENCY_HZ, weightToFrequency } from "./frequency-mapper";
export { PhaseContinuousOscillator } from "./oscillator";
export type { AudioOutputDevice, AudioStream, RenderCallback } from "./output-device";
export { renderInterleaved } from "./render";
export {
  SpawnedPlayerDevice,
  playerCommand,
  type PlayerCommand,
  type PlayerProcess,
  type SpawnPlayer,
  type SpawnedPlayerOptions,
} from "./spawned-player";
