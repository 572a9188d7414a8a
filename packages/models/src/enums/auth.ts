/**
 * Standard OAuth 2.0 error codes reported by the authorization server
 */
export const OAuthErrorCodes = {
  INVALID_REQUEST: 'invalid_request',
  INVALID_CLIENT: 'invalid_client',
  INVALID_GRANT: 'invalid_grant',
  INVALID_SCOPE: 'invalid_scope',
  ACCESS_DENIED: 'access_denied',
  EXPIRED_TOKEN: 'expired_token',
  SERVER_ERROR: 'server_error',
  // device-style polling (RFC 8628 section 3.5)
  AUTHORIZATION_PENDING: 'authorization_pending',
  SLOW_DOWN: 'slow_down',
} as const;

export type OAuthErrorCode = (typeof OAuthErrorCodes)[keyof typeof OAuthErrorCodes];

/**
 * Classification of the stored credential record
 */
export const TokenStates = {
  ABSENT: 'absent',
  VALID: 'valid',
  EXPIRED: 'expired',
  CORRUPTED: 'corrupted',
} as const;

export type TokenState = (typeof TokenStates)[keyof typeof TokenStates];

/**
 * Default bearer scheme marker for issued tokens
 */
export const DEFAULT_TOKEN_TYPE = 'Bearer';
