import { type DestinationStream, type Logger, destination as pinoDestination, pino } from "pino";

import type { LogLevel } from "./config.js";

export type { Logger };

/**
 * Structured JSON logger. Writes to stderr by default so stdout carries only the report.
 */
export function createLogger(level: LogLevel, destination: DestinationStream = pinoDestination(2)): Logger {
  return pino({ name: "bos-inspect", level }, destination);
}
