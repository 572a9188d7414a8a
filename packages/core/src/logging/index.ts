/**
 * Logging infrastructure exports
 *
 * Structured JSONL event logging plus a pino root logger with redaction
 */

export { rootLogger, createRootLogger, setupConsoleLogging, REDACT_PATHS } from './pino-setup.js';

export { logEvent, logError } from '../logger.js';
export type { LogLevel } from '../logger.js';
