import type { LogLevel } from "@mailsift/utils";
import pino from "pino";

/**
 * Create a logger at the configured level. Tests pass a destination to
 * capture the JSON lines; otherwise pino writes to stdout.
 */
export function createLogger(level: LogLevel, destination?: pino.DestinationStream): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    base: {
      pid: process.pid,
    },
  };

  return destination ? pino(options, destination) : pino(options);
}
