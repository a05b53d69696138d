/* eslint-disable no-console */
import type { Logger } from "./core.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface ConsoleLoggerOptions {
  /** Lowest level written; `debug` is also enabled by a `DEBUG` variable */
  readonly level?: LogLevel;
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Console logger writing every level to stderr, which leaves stdout to the
 * terminal renderer.
 */
export function createConsoleLogger(
  namespace: string,
  { level = "info", env = process.env }: ConsoleLoggerOptions = {},
): Logger {
  const prefix = `[${namespace}]`;
  const threshold = env["DEBUG"] ? 0 : LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel): boolean => LEVELS.indexOf(candidate) >= threshold;

  return {
    info(message: string, meta?: unknown): void {
      if (enabled("info")) console.error(prefix, message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      if (enabled("warn")) console.warn(prefix, message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      console.error(prefix, message, meta ?? "");
    },
    debug(message: string, meta?: unknown): void {
      if (enabled("debug")) console.error(prefix, "[debug]", message, meta ?? "");
    },
  } satisfies Logger;
}
