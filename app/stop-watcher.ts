import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import { getLogger } from "@/features/logging/logger";
import type { RunningFlag } from "@/features/shared-state";

const log = getLogger("app");

export interface StopWatcher {
  close(): void;
}

/**
 * Clear `flag` on the first line read from `input`, or when `input` ends
 * before one arrives. Closing the watcher leaves the flag alone.
 */
export function watchForStopLine(input: Readable, flag: RunningFlag): StopWatcher {
  const lines = createInterface({ input, terminal: false });
  let closed = false;

  const close = () => {
    if (closed) return;
    closed = true;
    lines.close();
  };

  lines.once("line", () => {
    close();
    if (flag.stop("line read")) log.info("Stop requested");
  });

  lines.once("close", () => {
    if (closed) return;
    closed = true;
    if (flag.stop("input closed")) log.info("Input closed, stopping");
  });

  return { close };
}
