/**
 * @profile-rag/logger
 *
 * Structured logging with secret and PII redaction. Ingested documents are CVs
 * and personal notes, so top-level string fields of every log line go through
 * {@link redactText} before they are written.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactText, REDACT_PATHS } from "./pii-redactor.js";
