import type { CredentialStatus } from '@credential-keeper/models';

/**
 * Outcome of a successful ensure_token / force_refresh. Token material is left out.
 *
 * `state` is the stored record's classification afterwards; a token issued with a
 * lifetime shorter than the skew window already reads as expired.
 */
export function summarizeToken(status: CredentialStatus, refreshed: boolean) {
  return {
    ok: true,
    state: status.state,
    refreshed,
    expiresAt: status.expiresAt,
    expiresInSeconds: status.expiresInSeconds,
    hasRefreshToken: status.hasRefreshToken,
    credentialsPath: status.credentialsPath,
  };
}
