import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const REDACT_PATHS = [
  "apiKey",
  "*.apiKey",
  "contactEmail",
  "*.contactEmail",
  "contactPhone",
  "*.contactPhone",
];

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson || config?.file
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  const options: pino.LoggerOptions = {
    level,
    base: { service: "ticket-desk" },
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, sync: true }));
  }

  return pino(options);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
