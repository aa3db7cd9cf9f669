/**
 * @indexflow/logger
 *
 * Structured logging with PII redaction for the indexing worker.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactText, redactRecord, REDACT_PATHS } from "./pii-redactor.js";
