/**
 * Output device backed by a system PCM player.
 *
 * Raw interleaved float32 (host byte order, little-endian hosts only) is
 * written to the player's stdin. Completed writes pace rendering, so the
 * render callback runs on the player's clock.
 */

import { spawn } from "node:child_process";
import { endianness } from "node:os";
import type { Writable } from "node:stream";

import type { PlayerKind, SampleFormat } from "@/features/config/app-config";
import { ConfigurationError, errorMessage } from "@/features/errors";

import type { AudioOutputDevice, AudioStream, RenderCallback } from "./output-device";

// ============================================================================
// PROCESS SEAM
// ============================================================================

export interface PlayerProcess {
  readonly stdin: Writable | null;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "spawn", listener: () => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnPlayer = (command: string, args: readonly string[]) => PlayerProcess;

const defaultSpawn: SpawnPlayer = (command, args) =>
  spawn(command, [...args], { stdio: ["pipe", "ignore", "inherit"] });

export interface PlayerCommand {
  command: string;
  args: string[];
}

export function playerCommand(
  player: PlayerKind,
  sampleRate: number,
  channels: number,
): PlayerCommand {
  const rate = String(sampleRate);
  const ch = String(channels);
  switch (player) {
    case "aplay":
      return { command: "aplay", args: ["-q", "-t", "raw", "-f", "FLOAT_LE", "-r", rate, "-c", ch, "-"] };
    case "pw-play":
      return { command: "pw-play", args: ["--format", "f32", "--rate", rate, "--channels", ch, "-"] };
    case "sox":
      return {
        command: "play",
        args: ["-q", "-t", "raw", "-e", "floating-point", "-b", "32", "-L", "-r", rate, "-c", ch, "-"],
      };
  }
}

// ============================================================================
// PCM PUMP
// ============================================================================

const RING_SIZE = 4;

/**
 * Renders into a fixed ring of buffers and writes them to the player.
 * A slot is rendered again only after its previous write has completed,
 * so the player's pipe paces rendering and nothing is allocated per buffer.
 */
class PcmPump {
  private readonly ring: Float32Array[];
  private readonly chunks: Buffer[];
  private next = 0;
  private inFlight = 0;
  private stopped = false;

  constructor(
    private readonly sink: Writable,
    private readonly render: RenderCallback,
    samplesPerBuffer: number,
  ) {
    this.ring = Array.from({ length: RING_SIZE }, () => new Float32Array(samplesPerBuffer));
    this.chunks = this.ring.map((samples) =>
      Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength),
    );
  }

  start(): void {
    this.fill();
  }

  stop(): void {
    this.stopped = true;
  }

  private fill(): void {
    while (!this.stopped && this.inFlight < RING_SIZE) {
      const slot = this.next;
      this.next = (slot + 1) % RING_SIZE;
      this.render(this.ring[slot]);
      this.inFlight++;
      this.sink.write(this.chunks[slot], this.onWritten);
    }
  }

  private readonly onWritten = (error?: Error | null): void => {
    this.inFlight--;
    // Write errors also reach the sink's "error" listener
    if (error) {
      this.stopped = true;
      return;
    }
    this.fill();
  };
}

// ============================================================================
// STREAM
// ============================================================================

const KILL_GRACE_MS = 2_000;

class SpawnedPlayerStream implements AudioStream {
  private child: PlayerProcess | null = null;
  private pump: PcmPump | null = null;
  private readonly errorHandlers: ((error: Error) => void)[] = [];
  private closing = false;
  private exited = false;

  constructor(
    private readonly command: PlayerCommand,
    private readonly render: RenderCallback,
    private readonly samplesPerBuffer: number,
    private readonly spawnPlayer: SpawnPlayer,
  ) {}

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  start(): Promise<void> {
    const { command, args } = this.command;

    return new Promise<void>((resolve, reject) => {
      let spawned = false;
      const child = this.spawnPlayer(command, args);
      this.child = child;

      child.on("error", (error) => {
        if (!spawned) {
          // A process that never spawned emits no exit
          this.exited = true;
          reject(toStartError(command, error));
          return;
        }
        this.fail(error);
      });

      child.on("exit", (code, signal) => {
        this.exited = true;
        this.detachSource();
        if (spawned && !this.closing) {
          this.fail(new Error(`${command} exited (code ${code}, signal ${signal})`));
        }
      });

      child.once("spawn", () => {
        spawned = true;
        const stdin = child.stdin;
        if (!stdin) {
          reject(new ConfigurationError("NO_OUTPUT_DEVICE", `${command} has no stdin pipe`));
          return;
        }
        stdin.on("error", (error: Error) => {
          if (!this.closing) this.fail(error);
        });
        const pump = new PcmPump(stdin, this.render, this.samplesPerBuffer);
        this.pump = pump;
        pump.start();
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    this.closing = true;
    const child = this.child;
    this.detachSource();
    this.child = null;
    if (!child || this.exited) return;

    await new Promise<void>((resolve) => {
      const timeoutId = setTimeout(resolve, KILL_GRACE_MS);
      child.on("exit", () => {
        clearTimeout(timeoutId);
        resolve();
      });
      child.stdin?.end();
      child.kill("SIGTERM");
    });
  }

  private detachSource(): void {
    this.pump?.stop();
    this.pump = null;
  }

  private fail(error: Error): void {
    this.errorHandlers.forEach((fn) => fn(error));
  }
}

function toStartError(command: string, error: Error): Error {
  if ("code" in error && error.code === "ENOENT") {
    return new ConfigurationError("NO_OUTPUT_DEVICE", `Audio player "${command}" not found`, {
      cause: error,
    });
  }
  return new ConfigurationError(
    "NO_OUTPUT_DEVICE",
    `Failed to start audio player "${command}": ${errorMessage(error)}`,
    { cause: error },
  );
}

// ============================================================================
// DEVICE
// ============================================================================

export interface SpawnedPlayerOptions {
  player: PlayerKind;
  sampleRate: number;
  channels: number;
  sampleFormat: SampleFormat;
  framesPerBuffer?: number;
  spawnPlayer?: SpawnPlayer;
}

export class SpawnedPlayerDevice implements AudioOutputDevice {
  readonly name: string;
  readonly sampleRate: number;
  readonly channels: number;
  readonly sampleFormat: SampleFormat;

  private readonly command: PlayerCommand;
  private readonly framesPerBuffer: number;
  private readonly spawnPlayer: SpawnPlayer;

  constructor(options: SpawnedPlayerOptions) {
    if (endianness() !== "LE") {
      throw new ConfigurationError(
        "UNSUPPORTED_SAMPLE_FORMAT",
        "Raw float32 output needs a little-endian host",
      );
    }
    this.sampleRate = options.sampleRate;
    this.channels = options.channels;
    this.sampleFormat = options.sampleFormat;
    this.framesPerBuffer = options.framesPerBuffer ?? 512;
    this.spawnPlayer = options.spawnPlayer ?? defaultSpawn;
    this.command = playerCommand(options.player, options.sampleRate, options.channels);
    this.name = this.command.command;
  }

  open(render: RenderCallback): AudioStream {
    return new SpawnedPlayerStream(
      this.command,
      render,
      this.framesPerBuffer * this.channels,
      this.spawnPlayer,
    );
  }
}
