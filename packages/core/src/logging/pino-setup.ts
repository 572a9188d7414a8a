/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (through pino) for path-based redaction of sensitive fields.
 * Output goes to stderr: stdout carries the MCP protocol when serving over stdio.
 */

import pino from 'pino';

/**
 * Paths censored in every log line.
 * @public
 */
export const REDACT_PATHS = [
  // OAuth & Authentication
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'accessToken',
  '*.accessToken',
  'refreshToken',
  '*.refreshToken',
  'token',
  '*.token',
  'authorization',
  '*.authorization',
  '*.Authorization',
  'developer_token',
  '*.developer_token',
  '*.developerToken',

  // OAuth flow correlation
  '*.code_verifier',
  'state',
  '*.state',

  // Generic sensitive patterns
  '*.password',
  '*.secret',
  '*.client_secret',
];

type LevelWithSilent = pino.LevelWithSilent;

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Reads the pino level from KEEPER_LOG_LEVEL; silent unless set.
 * @internal
 */
function levelFromEnv(): LevelWithSilent {
  const requested = (process.env.KEEPER_LOG_LEVEL || '').toLowerCase();
  return LEVELS.find((level) => level === requested) ?? 'silent';
}

/**
 * Creates a logger with the keeper's redaction rules.
 *
 * @param destination - Where log lines are written; stderr when omitted
 * @example
 * ```typescript
 * const logger = createRootLogger({ write: (line) => lines.push(line) });
 * logger.level = 'info';
 * logger.info({ access_token: 'abc' }); // access_token: '[REDACTED]'
 * ```
 * @public
 */
export function createRootLogger(destination?: pino.DestinationStream): pino.Logger {
  return pino(
    {
      name: 'credential-keeper',
      level: levelFromEnv(),
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
        remove: false,
      },
      serializers: {
        ...pino.stdSerializers,
        err: pino.stdSerializers.err,
      },
    },
    destination ?? pino.destination(2),
  );
}

/**
 * Root logger instance shared by every package.
 * @public
 */
const rootLogger = createRootLogger();

/**
 * Routes console.* calls through pino with automatic redaction.
 *
 * Call once at the entry point of a stdio server, before anything logs,
 * so that stray console output never lands on the protocol channel.
 * @public
 */
export function setupConsoleLogging(): void {
  (['debug', 'info', 'warn', 'error', 'log'] as const).forEach((name) => {
    console[name] = (...args: unknown[]) => {
      rootLogger[name === 'log' ? 'debug' : name](args);
    };
  });
}

export { rootLogger };
