import { SpawnedPlayerDevice } from "@/features/audio";
import { SimulatedProgressor, type BleTransport } from "@/features/bluetooth";
import { loadConfig, loadEnvFiles, type AppConfig } from "@/features/config";
import { formatFatal } from "@/features/errors";
import { getLogger, setLogLevel } from "@/features/logging/logger";
import { RunningFlag } from "@/features/shared-state";

import { runPulltone } from "./run";

const log = getLogger("app");

async function createTransport(config: AppConfig): Promise<BleTransport> {
  if (config.simulate) {
    log.info("Using simulated Progressor");
    return new SimulatedProgressor({ streamIntervalMs: 50 });
  }
  // noble binds the adapter on load
  const { NobleTransport } = await import("@/features/bluetooth/noble-transport");
  return new NobleTransport();
}

async function main(): Promise<number> {
  loadEnvFiles();
  const { config, warnings } = loadConfig();
  setLogLevel(config.logLevel);
  warnings.forEach((warning) => log.warn(warning));

  const running = new RunningFlag();
  process.once("SIGINT", () => running.stop("interrupted"));

  try {
    const { sampleRate, channels, sampleFormat, player } = config.audio;
    const device = new SpawnedPlayerDevice({ player, sampleRate, channels, sampleFormat });
    const transport = await createTransport(config);
    await runPulltone(config, { transport, device, input: process.stdin, running });
    return 0;
  } catch (error) {
    process.stderr.write(`${formatFatal(error)}\n`);
    return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    process.stderr.write(`${formatFatal(error)}\n`);
    process.exit(1);
  },
);
