/**
 * Reasons a credential operation can fail
 */
export enum CredentialErrorCode {
  CORRUPTED_RECORD = 'corrupted_record',
  INVALID_GRANT = 'invalid_grant',
  AUTH_FLOW_UNAVAILABLE = 'auth_flow_unavailable',
  AUTH_FLOW_TIMEOUT = 'auth_flow_timeout',
  AUTH_FLOW_FAILED = 'auth_flow_failed',
  AUTH_FLOW_CANCELLED = 'auth_flow_cancelled',
  TRANSPORT_ERROR = 'transport_error',
  ENSURE_TOKEN_FAILED = 'ensure_token_failed',
  STORAGE_ERROR = 'storage_error',
  CONFIGURATION_ERROR = 'configuration_error',
}

const DEFAULT_ACTIONS: Record<CredentialErrorCode, string> = {
  [CredentialErrorCode.CORRUPTED_RECORD]:
    'Call ensure_token to re-authorize; the unreadable record will be replaced',
  [CredentialErrorCode.INVALID_GRANT]: 'Call ensure_token to re-authorize',
  [CredentialErrorCode.AUTH_FLOW_UNAVAILABLE]:
    'Check KEEPER_OAUTH_BASE_URL and that the OAuth service is reachable, then retry',
  [CredentialErrorCode.AUTH_FLOW_TIMEOUT]:
    'Open the authorization URL promptly, then call ensure_token again',
  [CredentialErrorCode.AUTH_FLOW_FAILED]:
    'Review the reported error and call ensure_token again to restart authorization',
  [CredentialErrorCode.AUTH_FLOW_CANCELLED]: 'Call ensure_token again when ready to authorize',
  [CredentialErrorCode.TRANSPORT_ERROR]: 'Check network connectivity and call ensure_token again',
  [CredentialErrorCode.ENSURE_TOKEN_FAILED]:
    'Check network connectivity and call ensure_token again',
  [CredentialErrorCode.STORAGE_ERROR]: 'Check permissions on the credentials path',
  [CredentialErrorCode.CONFIGURATION_ERROR]:
    'Fix the listed settings in the environment or .env file',
};

export interface CredentialErrorOptions {
  /** Suggested next step; defaults per code */
  action?: string;
  cause?: Error;
  /** OAuth error code reported by the remote, e.g. `access_denied` */
  remoteError?: string;
}

/**
 * Error raised by every credential operation.
 *
 * Messages are sanitized so token material never reaches logs or tool results.
 */
export class CredentialError extends Error {
  public readonly code: CredentialErrorCode;
  public readonly action: string;
  public readonly cause?: Error;
  public readonly remoteError?: string;

  public constructor(message: string, code: CredentialErrorCode, options: CredentialErrorOptions = {}) {
    super(CredentialError.sanitizeMessage(message));
    this.name = 'CredentialError';
    this.code = code;
    this.action = options.action ?? DEFAULT_ACTIONS[code];
    this.cause = options.cause;
    this.remoteError = options.remoteError;

    Object.setPrototypeOf(this, CredentialError.prototype);
  }

  /**
   * Type guard, optionally narrowed to one code
   */
  public static is(error: unknown, code?: CredentialErrorCode): error is CredentialError {
    return error instanceof CredentialError && (code === undefined || error.code === code);
  }

  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\bBearer\s+[a-zA-Z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bstate=[^\s&]+/gi, 'state=[REDACTED]')
      .replace(/\bya29\.[\w.-]+/g, '[REDACTED_TOKEN]')
      .replace(/\b[a-zA-Z0-9+/]{32,}={0,2}/g, '[REDACTED_TOKEN]');
  }

  public static corruptedRecord(reason: string, cause?: Error): CredentialError {
    return new CredentialError(`Stored credentials are unreadable: ${reason}`, CredentialErrorCode.CORRUPTED_RECORD, {
      cause,
    });
  }

  public static invalidGrant(remoteError?: string, description?: string): CredentialError {
    const detail = description ?? remoteError;
    return new CredentialError(
      detail ? `Refresh token was rejected: ${detail}` : 'Refresh token was rejected',
      CredentialErrorCode.INVALID_GRANT,
      { remoteError },
    );
  }

  public static authFlowUnavailable(detail: string, cause?: Error): CredentialError {
    return new CredentialError(`Authorization flow could not be started: ${detail}`, CredentialErrorCode.AUTH_FLOW_UNAVAILABLE, {
      cause,
    });
  }

  public static authFlowTimeout(timeoutMs: number): CredentialError {
    return new CredentialError(
      `Authorization was not completed within ${Math.round(timeoutMs / 1000)}s`,
      CredentialErrorCode.AUTH_FLOW_TIMEOUT,
    );
  }

  public static authFlowFailed(remoteError: string, description?: string): CredentialError {
    return new CredentialError(
      `Authorization failed: ${description ? `${remoteError} (${description})` : remoteError}`,
      CredentialErrorCode.AUTH_FLOW_FAILED,
      { remoteError },
    );
  }

  public static authFlowCancelled(cause?: Error): CredentialError {
    return new CredentialError('Authorization was cancelled', CredentialErrorCode.AUTH_FLOW_CANCELLED, { cause });
  }

  public static transportError(detail: string, cause?: Error): CredentialError {
    return new CredentialError(`OAuth service request failed: ${detail}`, CredentialErrorCode.TRANSPORT_ERROR, { cause });
  }

  public static ensureTokenFailed(cause: Error): CredentialError {
    return new CredentialError(`Could not obtain a valid token: ${cause.message}`, CredentialErrorCode.ENSURE_TOKEN_FAILED, {
      cause,
    });
  }

  public static storageError(operation: 'read' | 'write' | 'clear', location: string, cause?: Error): CredentialError {
    return new CredentialError(
      `Could not ${operation} credentials at ${location}${cause ? `: ${cause.message}` : ''}`,
      CredentialErrorCode.STORAGE_ERROR,
      { cause },
    );
  }

  public static configurationError(problems: string[]): CredentialError {
    return new CredentialError(`Invalid configuration: ${problems.join('; ')}`, CredentialErrorCode.CONFIGURATION_ERROR);
  }

  /**
   * Structured form returned in tool results
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      action: this.action,
      ...(this.remoteError ? { remoteError: this.remoteError } : {}),
      ...(this.cause ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Normalizes a thrown value to an Error
 * @internal
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
