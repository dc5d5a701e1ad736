/**
 * Pino loggers for the pipeline and worker: pretty in development, JSON
 * everywhere else, secrets redacted.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "debug" in development, "info" elsewhere. */
  level?: string;
  /** Bound as `service` on every line. */
  service?: string;
  /** Discard all output (tests). */
  silent?: boolean;
  /** Human-readable output; defaults to on in development. */
  pretty?: boolean;
}

export interface JobBindings {
  jobId: string;
  userId: string;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  if (options.silent) {
    return pino({ level: "silent" });
  }

  const pretty = options.pretty ?? isDevelopment();

  return pino({
    level: options.level ?? (isDevelopment() ? "debug" : "info"),
    base: { service: options.service ?? "indexloom" },
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: { err: pino.stdSerializers.err },
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
          },
        }
      : {}),
  });
}

/**
 * Child logger for one ingestion job; every line carries the job and user.
 */
export function jobLogger(parent: Logger, bindings: JobBindings): Logger;
export function jobLogger(parent: Logger | undefined, bindings: JobBindings): Logger | undefined;
export function jobLogger(parent: Logger | undefined, bindings: JobBindings): Logger | undefined {
  return parent?.child({ jobId: bindings.jobId, userId: bindings.userId });
}
