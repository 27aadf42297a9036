/**
 * @ingestkit/logger
 *
 * Structured logging with secret redaction for the ingestion jobs.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactUri, REDACT_PATHS } from "./redactor.js";
