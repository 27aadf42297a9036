/**
 * Pino loggers for the worker and the job libraries.
 *
 * One root logger per process, one child per job run. Secret-bearing fields
 * are censored by path; URLs in free text go through `redactUri` first.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "info", or "debug" when NODE_ENV is "development". */
  level?: string;
  /** Written as `name` on every line. */
  service?: string;
  /** Receives the JSON lines instead of stdout; disables pretty-printing. */
  destination?: pino.DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

// pino-pretty only for a developer running a job by hand; orchestrated runs emit JSON.
function buildTransport(): pino.TransportSingleOptions | undefined {
  if (!isDevelopment()) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const settings: pino.LoggerOptions = {
    level,
    name: options?.service ?? "ingestkit",
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(settings, options.destination);
  }
  const transport = buildTransport();
  return pino(transport ? { ...settings, transport } : settings);
}

/**
 * Child logger for one job run. The worker binds `{ job, documentSetId }` for
 * ingestion and `{ job, indexId }` for index builds.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** Logger that drops everything; the default for library code called without one. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
