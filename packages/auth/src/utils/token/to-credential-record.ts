import { DEFAULT_TOKEN_TYPE, type CredentialRecord, type TokenResponse } from '@credential-keeper/models';
import { fromEpochMs, parseExpiresAt } from './parse-expires-at.js';

/**
 * Lifetime assumed when a response carries neither `expires_at` nor `expires_in`
 * @public
 */
export const DEFAULT_EXPIRY_SECONDS = 3600;

/**
 * Absolute expiry of a token response: `expires_at`, else `now + expires_in`,
 * else `now + 3600s`. Unrepresentable values fall through to the next option.
 * @public
 */
export function resolveExpiresAt(response: TokenResponse, now: Date): Date {
  if (response.expires_at !== undefined) {
    const explicit = parseExpiresAt(response.expires_at);
    if (explicit) return explicit;
  }
  if (response.expires_in !== undefined) {
    const relative = fromEpochMs(now.getTime() + response.expires_in * 1000);
    if (relative) return relative;
  }
  return new Date(now.getTime() + DEFAULT_EXPIRY_SECONDS * 1000);
}

/**
 * Converts a token response into the persisted record shape.
 *
 * `refresh_token` is only set when the response carries one; keeping a previous
 * refresh token is the caller's decision.
 * @public
 */
export function toCredentialRecord(response: TokenResponse, now: Date): CredentialRecord {
  const record: CredentialRecord = {
    access_token: response.access_token,
    expires_at: resolveExpiresAt(response, now).toISOString(),
    token_type: response.token_type || DEFAULT_TOKEN_TYPE,
    scope: response.scope ?? '',
  };
  if (response.refresh_token) {
    record.refresh_token = response.refresh_token;
  }
  return record;
}
