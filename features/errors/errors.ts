/**
 * Error taxonomy.
 *
 * Configuration errors are fatal at startup. Session errors are fatal to
 * the telemetry session. Frame decode problems never become errors.
 */

export type ConfigurationErrorCode =
  | "UNSUPPORTED_SAMPLE_FORMAT"
  | "NO_OUTPUT_DEVICE"
  | "INVALID_CONFIG";

export type SessionErrorCode =
  | "ADAPTER_UNAVAILABLE"
  | "DEVICE_NOT_FOUND"
  | "CONNECTION_FAILED"
  | "SERVICE_NOT_FOUND"
  | "CHARACTERISTIC_NOT_FOUND"
  | "SUBSCRIBE_FAILED"
  | "WRITE_FAILED"
  | "STREAM_FAILED"
  | "TIMEOUT";

export type ErrorCode = ConfigurationErrorCode | SessionErrorCode | "UNKNOWN";

export interface ErrorRecord {
  code: ErrorCode;
  message: string;
  timestamp: number;
}

export class PulltoneError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PulltoneError";
    this.code = code;
  }
}

export class ConfigurationError extends PulltoneError {
  declare readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ConfigurationError";
  }
}

export class SessionError extends PulltoneError {
  declare readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "SessionError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function toErrorRecord(error: unknown, now: number = Date.now()): ErrorRecord {
  const code = error instanceof PulltoneError ? error.code : "UNKNOWN";
  return { code, message: errorMessage(error), timestamp: now };
}

/**
 * Wrap a transport failure in a SessionError, keeping SessionErrors as-is.
 */
export function asSessionError(
  code: SessionErrorCode,
  context: string,
  error: unknown,
): SessionError {
  if (error instanceof SessionError) return error;
  return new SessionError(code, `${context}: ${errorMessage(error)}`, { cause: error });
}

/** `[CODE] message`, as printed when the process exits on an error. */
export function formatFatal(error: unknown): string {
  const { code, message } = toErrorRecord(error);
  return `[${code}] ${message}`;
}
