/**
 * Wires one run of the program: audio starts, the session streams weights
 * into the shared cell, a line on `input` (or the caller's flag) stops it.
 * Audio is stopped on every exit path; errors propagate to the caller.
 */

import type { Readable } from "node:stream";

import { AudioEngine, type AudioOutputDevice } from "@/features/audio";
import { ProgressorSession, type BleTransport } from "@/features/bluetooth";
import type { AppConfig } from "@/features/config";
import { getLogger } from "@/features/logging/logger";
import { RunningFlag, SharedWeightCell } from "@/features/shared-state";

import { watchForStopLine } from "./stop-watcher";

const log = getLogger("app");

export interface PulltoneDeps {
  transport: BleTransport;
  device: AudioOutputDevice | null;
  input: Readable;
  running?: RunningFlag;
}

export async function runPulltone(config: AppConfig, deps: PulltoneDeps): Promise<void> {
  const running = deps.running ?? new RunningFlag();
  const cell = new SharedWeightCell();
  const engine = AudioEngine.create(deps.device, cell.reader(), {
    baseFrequency: config.audio.baseFrequency,
  });

  const session = new ProgressorSession(deps.transport, config.session);
  session.addEventListener((event) => {
    switch (event.type) {
      case "battery":
        log.debug("Battery", { raw: event.raw });
        break;
      case "stateChanged":
        if (event.state === "streaming") log.info("Streaming weight; press Enter to stop");
        break;
    }
  });

  await engine.start();
  const watcher = watchForStopLine(deps.input, running);
  try {
    await session.run(running, cell.writer());
  } finally {
    watcher.close();
    await engine.stop();
  }
  log.info("Done", { frames: session.getState().framesReceived });
}
