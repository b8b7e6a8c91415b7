/**
 * Creates structured pino loggers: pretty output in development, JSON lines
 * everywhere else, credentials redacted.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redact-paths.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Component name attached to every log line. */
  service?: string;
  /** Force or disable the pino-pretty transport; follows NODE_ENV when omitted. */
  pretty?: boolean;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(pretty: boolean): pino.TransportSingleOptions | undefined {
  if (!pretty) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

/**
 * Create a new root logger.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "logrecall";
  const transport = buildTransport(options?.pretty ?? isDevelopment());

  return pino({
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport ? { transport } : {}),
  });
}

/**
 * Child logger with extra bindings (e.g. `source`, `collection`) on every line.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * Logger that drops everything; for tests and library callers that pass none.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
