import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const REDACT_PATHS = ["apiKey", "*.apiKey", "headers.authorization"];

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  const options: pino.LoggerOptions = {
    level,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  return pino(options);
}

/** Silent logger for tests and library callers that don't care about output. */
export function createNullLogger(): Logger {
  return pino({ level: "silent" });
}

export function stageLogger(logger: Logger, stage: string): Logger {
  return logger.child({ stage });
}
