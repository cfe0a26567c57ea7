import pino, { type Logger } from "pino";

export interface LoggerLike {
  debug(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
}

/** Starts at `info`; the validated `LOG_LEVEL` is applied once config has loaded. */
export function createLogger(level = "info"): Logger {
  return pino({ level });
}

export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
