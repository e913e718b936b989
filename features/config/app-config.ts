/**
 * Runtime configuration.
 *
 * Read once at startup from the process environment. `loadEnvFiles` pulls
 * a `.env` from the working directory first (dotenv + dotenv-expand).
 * Every setting falls back to its default when unset. Values that do not
 * parse fall back with a warning, and out-of-range numbers are clamped
 * with one.
 */

import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

import {
  clampToRange,
  parseBoolean,
  parseChoice,
  parseInteger,
  readEnv,
  type IntegerRange,
  type RuntimeEnv,
} from "./env";

export const SAMPLE_FORMATS = ["f32", "s16", "u16"] as const;
export type SampleFormat = (typeof SAMPLE_FORMATS)[number];

export const PLAYERS = ["aplay", "pw-play", "sox"] as const;
export type PlayerKind = (typeof PLAYERS)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AudioConfig {
  sampleRate: number;
  channels: number;
  sampleFormat: SampleFormat;
  player: PlayerKind;
  baseFrequency: number;
}

export interface SessionConfig {
  /** 0 waits forever */
  scanTimeoutMs: number;
  /** Bound on each BLE round trip; 0 disables it */
  operationTimeoutMs: number;
  connectAttempts: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
}

export interface AppConfig {
  audio: AudioConfig;
  session: SessionConfig;
  simulate: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  audio: {
    sampleRate: 44_100,
    channels: 2,
    sampleFormat: "f32",
    player: "aplay",
    baseFrequency: 110,
  },
  session: {
    scanTimeoutMs: 30_000,
    operationTimeoutMs: 10_000,
    connectAttempts: 1,
    reconnectBaseDelayMs: 1_000,
    reconnectMaxDelayMs: 15_000,
  },
  simulate: false,
  logLevel: "info",
};

export interface LoadedConfig {
  config: AppConfig;
  warnings: string[];
}

export function loadEnvFiles(): void {
  dotenvExpand.expand(dotenv.config());
}

export function loadConfig(env: RuntimeEnv = process.env): LoadedConfig {
  const warnings: string[] = [];

  const integer = (key: string, range: IntegerRange, fallback: number): number => {
    const raw = readEnv(env, key);
    if (raw === null) return fallback;
    const parsed = parseInteger(raw);
    if (parsed === null) {
      warnings.push(`${key}="${raw}" is not a whole number; using ${fallback}`);
      return fallback;
    }
    const clamped = clampToRange(parsed, range);
    if (clamped !== parsed) {
      warnings.push(`${key}=${parsed} is outside ${range.min}..${range.max}; using ${clamped}`);
    }
    return clamped;
  };

  const flag = (key: string, fallback: boolean): boolean => {
    const raw = readEnv(env, key);
    if (raw === null) return fallback;
    const parsed = parseBoolean(raw);
    if (parsed === null) {
      warnings.push(`${key}="${raw}" is not a boolean; using ${fallback}`);
      return fallback;
    }
    return parsed;
  };

  const choice = <T extends string>(key: string, choices: readonly T[], fallback: T): T => {
    const raw = readEnv(env, key);
    if (raw === null) return fallback;
    const parsed = parseChoice(raw, choices);
    if (parsed === null) {
      warnings.push(`${key}="${raw}" is not one of ${choices.join(", ")}; using ${fallback}`);
      return fallback;
    }
    return parsed;
  };

  const { audio, session } = DEFAULT_CONFIG;

  return {
    config: {
      audio: {
        sampleRate: integer("PULLTONE_SAMPLE_RATE", { min: 8_000, max: 192_000 }, audio.sampleRate),
        channels: integer("PULLTONE_CHANNELS", { min: 1, max: 8 }, audio.channels),
        sampleFormat: choice("PULLTONE_SAMPLE_FORMAT", SAMPLE_FORMATS, audio.sampleFormat),
        player: choice("PULLTONE_PLAYER", PLAYERS, audio.player),
        baseFrequency: integer("PULLTONE_BASE_FREQUENCY", { min: 20, max: 2_000 }, audio.baseFrequency),
      },
      session: {
        scanTimeoutMs: integer("PULLTONE_SCAN_TIMEOUT_MS", { min: 0, max: 600_000 }, session.scanTimeoutMs),
        operationTimeoutMs: integer(
          "PULLTONE_OPERATION_TIMEOUT_MS",
          { min: 0, max: 120_000 },
          session.operationTimeoutMs,
        ),
        connectAttempts: integer("PULLTONE_CONNECT_ATTEMPTS", { min: 1, max: 10 }, session.connectAttempts),
        reconnectBaseDelayMs: integer(
          "PULLTONE_RECONNECT_BASE_DELAY_MS",
          { min: 0, max: 60_000 },
          session.reconnectBaseDelayMs,
        ),
        reconnectMaxDelayMs: session.reconnectMaxDelayMs,
      },
      simulate: flag("PULLTONE_SIMULATE", DEFAULT_CONFIG.simulate),
      logLevel: choice("PULLTONE_LOG_LEVEL", LOG_LEVELS, DEFAULT_CONFIG.logLevel),
    },
    warnings,
  };
}
