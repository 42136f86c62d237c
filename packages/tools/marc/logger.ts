// Diagnostics logger - pino on stderr, never mixed with command output

import pino from "pino";
import type { Logger } from "pino";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export function createRootLogger(level: LogLevel): Logger {
  return pino(
    { name: "marc", level, base: null },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** Logger that drops everything, for tests and library use. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
