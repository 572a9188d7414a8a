import { appendFileSync, mkdirSync } from 'fs';
import { resolve } from 'path';
import { rootLogger } from './logging/pino-setup.js';
import { getKeeperHome } from './paths.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const ORDER: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const preparedDirs = new Set<string>();

/**
 * Reads the current log level from KEEPER_LOG_LEVEL.
 * Defaults to 'info' if not set or invalid.
 * @internal
 */
function currentLevel(): LogLevel {
  const env = (process.env.KEEPER_LOG_LEVEL || '').toLowerCase();
  return ORDER.find((level) => level === env) ?? 'info';
}

/**
 * Checks if logging is enabled for a given level based on current configuration.
 * @internal
 */
function enabled(min: LogLevel): boolean {
  return ORDER.indexOf(currentLevel()) >= ORDER.indexOf(min);
}

/**
 * Gets or generates a stable per-process run identifier for log correlation.
 * @internal
 */
function runId(): string {
  if (!process.env.KEEPER_RUN_ID) {
    process.env.KEEPER_RUN_ID = `${Date.now()}-${process.pid}`;
  }
  return process.env.KEEPER_RUN_ID;
}

/**
 * Path of the JSON Lines log file for the current run, creating its directory once.
 * @internal
 */
function logFile(): string {
  const dir = resolve(getKeeperHome(), 'logs');
  if (!preparedDirs.has(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
    preparedDirs.add(dir);
  }
  return resolve(dir, `run-${runId()}.jsonl`);
}

/**
 * Writes a structured log event.
 *
 * Every event is mirrored to the pino root logger. The JSON Lines file is
 * written when KEEPER_LOG is `1`/`true` or the level is error, respecting the
 * KEEPER_LOG_LEVEL threshold. Never throws.
 * @param level - Log severity level
 * @param event - Event identifier, `area:what_happened`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  rootLogger[level]({ event, data }, event);

  const loggingEnabled =
    process.env.KEEPER_LOG === '1' || process.env.KEEPER_LOG === 'true' || level === 'error';
  if (!loggingEnabled) return;

  if (level !== 'error' && !enabled(level)) return;

  const entry = {
    ts: new Date().toISOString(),
    pid: process.pid,
    level,
    event,
    data,
  };
  try {
    appendFileSync(logFile(), JSON.stringify(entry) + '\n', {
      encoding: 'utf8',
    });
  } catch (error) {
    rootLogger.warn({ err: error, event }, 'log file write failed');
  }
}

/**
 * Logs an error event with context for debugging.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(context: string, rawError: unknown, extra?: unknown): void {
  const err = rawError instanceof Error ? rawError : undefined;
  const code =
    rawError && typeof rawError === 'object' && 'code' in rawError ? rawError.code : undefined;
  logEvent('error', `error:${context}`, {
    message: err?.message ?? String(rawError),
    stack: err?.stack,
    code,
    extra,
    argv: process.argv,
    cwd: process.cwd(),
  });
}
