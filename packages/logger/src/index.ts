/**
 * @docenrich/logger
 *
 * Structured logging for the ingestion pipeline.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, preview } from "./redact.js";
