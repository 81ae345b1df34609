import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

// Counterpart phone numbers never reach log sinks in clear text.
const REDACT_PATHS = ["address", "counterpartAddress", "*.counterpartAddress"];

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson =
    config?.file !== undefined || (config?.json ?? process.env["NODE_ENV"] === "production");

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  const options: pino.LoggerOptions = {
    level,
    base: { service: "textpulse" },
    redact: { paths: REDACT_PATHS, censor: maskAddress },
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  return pino(options);
}

/** Keeps the last four digits so support can still correlate a thread. */
export function maskAddress(value: unknown): string {
  if (typeof value !== "string" || value.length <= 4) return "***";
  return `***${value.slice(-4)}`;
}
