import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const STDERR_FD = 2;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const options: pino.LoggerOptions = { level };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  // Translations go to stdout, so log lines stay on stderr.
  if (isJson) {
    return pino(options, pino.destination(STDERR_FD));
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        destination: STDERR_FD,
      },
    },
  });
}
