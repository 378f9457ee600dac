/**
 * Logger setup
 *
 * Pino loggers with secret redaction, pretty-printing in development and JSON
 * lines everywhere else. CLI runs write logs to stderr so that stdout carries
 * only the command's own output.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redact.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical component name attached to every log line. */
  service?: string;
  /** Force or disable pino-pretty; defaults to NODE_ENV === "development". */
  pretty?: boolean;
  /** File descriptor to write to. Default: 1 (stdout). */
  fd?: 1 | 2;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(fd: 1 | 2): pino.TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      destination: fd,
    },
  };
}

/**
 * Create a new root Pino logger.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "docenrich";
  const fd = options?.fd ?? 1;
  const pretty = options?.pretty ?? isDevelopment();

  const base: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) {
    return pino({ ...base, transport: buildTransport(fd) });
  }
  return pino(base, pino.destination({ fd, sync: true }));
}

/**
 * Create a child logger that adds run-scoped bindings (e.g. `runId`, `chunkId`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
