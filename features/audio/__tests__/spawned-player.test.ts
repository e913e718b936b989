import { EventEmitter } from "node:events";
import { Writable } from "node:stream";

import { describe, it, expect, vi } from "vitest";

import { ConfigurationError } from "@/features/errors";

import { SpawnedPlayerDevice, playerCommand, type SpawnPlayer } from "../spawned-player";

/** Copies each chunk like a pipe does, and completes writes on `release`. */
class PipeSink extends Writable {
  readonly chunks: Buffer[] = [];
  private readonly pending: ((error?: Error | null) => void)[] = [];

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(Buffer.from(chunk));
    this.pending.push(callback);
  }

  release(): void {
    this.pending.shift()?.();
  }
}

class FakePlayer extends EventEmitter {
  readonly stdin = new PipeSink();

  kill = vi.fn((signal?: NodeJS.Signals) => {
    setImmediate(() => this.emit("exit", null, signal ?? "SIGTERM"));
    return true;
  });
}

function fakeSpawner(outcome: "spawn" | Error = "spawn") {
  const players: FakePlayer[] = [];
  const calls: { command: string; args: readonly string[] }[] = [];
  const spawnPlayer: SpawnPlayer = (command, args) => {
    const player = new FakePlayer();
    players.push(player);
    calls.push({ command, args });
    setImmediate(() => {
      if (outcome === "spawn") player.emit("spawn");
      else player.emit("error", outcome);
    });
    return player;
  };
  return { spawnPlayer, players, calls };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("playerCommand", () => {
  it("builds raw float32 arguments for each player", () => {
    expect(playerCommand("aplay", 44_100, 2)).toEqual({
      command: "aplay",
      args: ["-q", "-t", "raw", "-f", "FLOAT_LE", "-r", "44100", "-c", "2", "-"],
    });
    expect(playerCommand("pw-play", 48_000, 1)).toEqual({
      command: "pw-play",
      args: ["--format", "f32", "--rate", "48000", "--channels", "1", "-"],
    });
    expect(playerCommand("sox", 22_050, 2)).toEqual({
      command: "play",
      args: ["-q", "-t", "raw", "-e", "floating-point", "-b", "32", "-L", "-r", "22050", "-c", "2", "-"],
    });
  });
});

describe("SpawnedPlayerDevice", () => {
  const options = { player: "aplay", sampleRate: 44_100, channels: 2, sampleFormat: "f32" } as const;

  it("streams rendered buffers to the player's stdin", async () => {
    const { spawnPlayer, players, calls } = fakeSpawner();
    const device = new SpawnedPlayerDevice({ ...options, framesPerBuffer: 4, spawnPlayer });
    expect(device.name).toBe("aplay");

    let value = 0;
    const stream = device.open((out) => {
      for (let i = 0; i < out.length; i++) out[i] = (value += 0.125);
    });
    await stream.start();

    expect(calls).toHaveLength(1);
    expect(calls[0].args).toEqual(playerCommand("aplay", 44_100, 2).args);

    const [chunk] = players[0].stdin.chunks;
    expect(chunk.length).toBe(4 * 2 * 4);
    expect(chunk.readFloatLE(0)).toBe(0.125);
    expect(chunk.readFloatLE(4)).toBe(0.25);
    expect(chunk.readFloatLE(28)).toBe(1);

    await stream.close();
    expect(players[0].kill).toHaveBeenCalledWith("SIGTERM");
  });

  it("renders a new buffer only when a write completes", async () => {
    const { spawnPlayer, players } = fakeSpawner();
    let renders = 0;
    const render = vi.fn((out: Float32Array) => {
      renders++;
      out.fill(renders);
    });
    const stream = new SpawnedPlayerDevice({ ...options, framesPerBuffer: 2, spawnPlayer }).open(
      render,
    );
    await stream.start();
    await tick();

    // The ring of four buffers is filled, then rendering waits on the pipe
    expect(render).toHaveBeenCalledTimes(4);

    const sink = players[0].stdin;
    sink.release();
    await tick();
    expect(render).toHaveBeenCalledTimes(5);
    // Reusing the first buffer leaves the bytes already written intact
    expect(sink.chunks[0].readFloatLE(0)).toBe(1);

    await stream.close();
  });

  it("reports a missing player binary as NO_OUTPUT_DEVICE", async () => {
    const enoent = Object.assign(new Error("spawn aplay ENOENT"), { code: "ENOENT" });
    const { spawnPlayer } = fakeSpawner(enoent);
    const stream = new SpawnedPlayerDevice({ ...options, spawnPlayer }).open(() => undefined);

    const error = await stream.start().then(
      () => null,
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.code).toBe("NO_OUTPUT_DEVICE");
      expect(error.message).toBe('Audio player "aplay" not found');
    }
  });

  it("closes at once after a failed spawn", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    try {
      const { spawnPlayer, players } = fakeSpawner(new Error("EACCES"));
      const stream = new SpawnedPlayerDevice({ ...options, spawnPlayer }).open(() => undefined);
      await expect(stream.start()).rejects.toThrow(ConfigurationError);

      // Resolves without waiting for an exit that never comes
      await stream.close();
      expect(vi.getTimerCount()).toBe(0);
      expect(players[0].kill).not.toHaveBeenCalled();
    } finally {
      vi.useRealTimers();
    }
  });

  it("reports other spawn failures with their reason", async () => {
    const { spawnPlayer } = fakeSpawner(new Error("EACCES"));
    const stream = new SpawnedPlayerDevice({ ...options, spawnPlayer }).open(() => undefined);

    await expect(stream.start()).rejects.toThrow('Failed to start audio player "aplay": EACCES');
  });

  it("raises an error when the player exits on its own", async () => {
    const { spawnPlayer, players } = fakeSpawner();
    const stream = new SpawnedPlayerDevice({ ...options, spawnPlayer }).open(() => undefined);
    const onError = vi.fn();
    stream.onError(onError);
    await stream.start();

    players[0].emit("exit", 1, null);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toEqual(new Error("aplay exited (code 1, signal null)"));

    await stream.close();
    expect(players[0].kill).not.toHaveBeenCalled();
  });

  it("does not report the exit it asked for", async () => {
    const { spawnPlayer } = fakeSpawner();
    const stream = new SpawnedPlayerDevice({ ...options, spawnPlayer }).open(() => undefined);
    const onError = vi.fn();
    stream.onError(onError);
    await stream.start();

    await stream.close();
    expect(onError).not.toHaveBeenCalled();
  });
});
