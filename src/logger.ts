import pino from "pino";
import type { DroverConfig } from "./config.js";

export type Logger = pino.Logger;

/**
 * Pretty-printed logger writing to stderr, so command output on stdout stays
 * clean for piping.
 */
export function createLogger(config: Pick<DroverConfig, "logLevel">): Logger {
  return pino({
    level: config.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        destination: 2,
      },
    },
  });
}

/** Logger that discards everything, for library callers that do not want output. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
