/* eslint-disable no-console */
import type { LogLevel } from "@/features/config/app-config";

export type LoggerMetadata = Record<string, unknown>;

type EmitLevel = LogLevel | "fatal";

const LEVEL_RANK: Record<EmitLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

type ConsoleWriter = (...args: unknown[]) => void;

// Looked up per call so tests can spy on console
const consoleWriters: Record<EmitLevel, ConsoleWriter> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
  fatal: (...args) => console.error(...args),
};

let minimumLevel: LogLevel = "info";

export const setLogLevel = (level: LogLevel): void => {
  minimumLevel = level;
};

export const formatConsolePayload = (
  level: EmitLevel,
  module: string,
  message: string,
  timestamp: string = new Date().toISOString(),
): string => `[${timestamp}] [${level.toUpperCase()}] [${module}] ${message}`;

const createEmitter =
  (module: string, level: EmitLevel) =>
  (message: string, metadata?: LoggerMetadata) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) {
      return;
    }

    const line = formatConsolePayload(level, module, message);
    if (metadata && Object.keys(metadata).length > 0) {
      consoleWriters[level](line, metadata);
    } else {
      consoleWriters[level](line);
    }
  };

export const createLogger = (module: string) => ({
  debug: createEmitter(module, "debug"),
  info: createEmitter(module, "info"),
  warn: createEmitter(module, "warn"),
  error: createEmitter(module, "error"),
  fatal: createEmitter(module, "fatal"),
});

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string): Logger => {
  const cached = loggerCache.get(module);
  if (cached) {
    return cached;
  }

  const logger = createLogger(module);
  loggerCache.set(module, logger);
  return logger;
};
