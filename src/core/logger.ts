/**
 * Structured logging (pino).
 */
import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(
  level: LogLevel = "info",
  destination?: DestinationStream,
): Logger {
  const options = { name: "channel-harvest", level };
  return destination ? pino(options, destination) : pino(options);
}

/** Logger used when a component is built without one. */
export const rootLogger: Logger = createLogger(
  process.env.NODE_ENV === "test" ? "silent" : "info",
);
