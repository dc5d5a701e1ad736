/**
 * Structured logging with secret and PII redaction.
 */

export { createLogger, jobLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions, JobBindings } from "./logger.js";
export { redactText, REDACT_PATHS } from "./pii-redactor.js";
