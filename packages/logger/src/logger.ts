/**
 * Main Logger Setup
 *
 * Creates structured Pino logger instances with secret redaction, pretty-printing
 * in development, and JSON output in production / test environments.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactValue } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Write to this stream instead of stdout. Disables pretty-printing. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * - In **development** we pipe through `pino-pretty` for human-readable output.
 * - In **production / test** we emit structured JSON (no transport needed).
 */
function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

/** Contact details in string fields are masked before the line is written. */
function redactFields(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).map(([key, value]) => [key, redactValue(key, value)]));
}

/**
 * Create a new root Pino logger.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "profile-rag";

  const baseOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: { log: redactFields },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(baseOptions, options.destination);
  }

  const transport = buildTransport();
  return pino({ ...baseOptions, ...(transport ? { transport } : {}) });
}

/**
 * Create a child logger that inherits the parent's configuration and adds
 * run-scoped bindings (e.g. `component`, `runId`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
