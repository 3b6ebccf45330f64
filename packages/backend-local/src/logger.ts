/* eslint-disable no-console */
import type { Logger } from "./core.js";

const LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/** `LOG_LEVEL` wins; otherwise `DEBUG` turns on debug lines. */
export function resolveLogLevel(env: Readonly<Record<string, string | undefined>>): LogLevel {
  const configured = env["LOG_LEVEL"]?.toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return env["DEBUG"] ? "debug" : "info";
}

export function createConsoleLogger(
  namespace: string,
  level: LogLevel = resolveLogLevel(process.env),
): Logger {
  const prefix = `[${namespace}]`;
  const threshold = LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel): boolean => LEVELS.indexOf(candidate) >= threshold;

  return {
    info(message: string, meta?: unknown): void {
      if (enabled("info")) console.info(prefix, message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      if (enabled("warn")) console.warn(prefix, message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      console.error(prefix, message, meta ?? "");
    },
    debug(message: string, meta?: unknown): void {
      if (enabled("debug")) console.debug(prefix, message, meta ?? "");
    },
  } satisfies Logger;
}
