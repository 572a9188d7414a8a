import {
  DEFAULT_TOKEN_TYPE,
  TokenStates,
  type CredentialRecord,
  type StoredCredentialRecord,
  type TokenAssessment,
} from '@credential-keeper/models';
import { parseExpiresAt } from '../utils/token/parse-expires-at.js';

/**
 * Tokens this close to expiry are treated as expired (5 minutes)
 * @public
 */
export const DEFAULT_SKEW_WINDOW_MS = 5 * 60 * 1000;

/**
 * Classifies a stored record against the clock.
 *
 * - absent: no record, or no access token
 * - corrupted: access token without a usable `expires_at`
 * - expired: `now >= expires_at - skewWindowMs`
 * - valid: otherwise
 *
 * Pure; `expired` and `valid` carry the normalized record.
 * @example
 * ```typescript
 * const assessment = classifyTokenState(await store.read(), new Date());
 * if (assessment.state === 'valid') return assessment.record.access_token;
 * ```
 * @public
 */
export function classifyTokenState(
  record: StoredCredentialRecord | null,
  now: Date,
  skewWindowMs: number = DEFAULT_SKEW_WINDOW_MS,
): TokenAssessment {
  if (!record || !record.access_token) {
    return { state: TokenStates.ABSENT };
  }

  if (record.expires_at === undefined || record.expires_at === '') {
    return { state: TokenStates.CORRUPTED, reason: 'expires_at is missing' };
  }

  const expiresAt = parseExpiresAt(record.expires_at);
  if (!expiresAt) {
    return { state: TokenStates.CORRUPTED, reason: 'expires_at is not a valid timestamp' };
  }

  const normalized: CredentialRecord = {
    access_token: record.access_token,
    expires_at: expiresAt.toISOString(),
    token_type: record.token_type || DEFAULT_TOKEN_TYPE,
    scope: record.scope ?? '',
  };
  if (record.refresh_token) {
    normalized.refresh_token = record.refresh_token;
  }

  if (now.getTime() >= expiresAt.getTime() - skewWindowMs) {
    return { state: TokenStates.EXPIRED, record: normalized, expiresAt };
  }
  return { state: TokenStates.VALID, record: normalized, expiresAt };
}
