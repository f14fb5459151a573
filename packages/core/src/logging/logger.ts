import { pino } from "pino";
import type { DestinationStream, Logger, LoggerOptions } from "pino";
import type { LogLevel } from "@keyshift/shared";

export type { Logger };

// Secrets can reach a log call through action payloads; never print them.
const REDACT_PATHS = [
  "secret",
  "oldSecret",
  "newSecret",
  "confirmSecret",
  "pin",
  "password",
  "*.secret",
  "*.oldSecret",
  "*.newSecret",
  "*.confirmSecret",
  "*.pin",
  "*.password",
  "sessionToken",
  "*.sessionToken",
];

export function createLogger(level: LogLevel = "info", destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: "keyshift",
    level,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  };
  return destination ? pino(options, destination) : pino(options);
}

/** A logger that discards everything. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
