import type { TokenState } from '../../enums/auth.js';

/**
 * Operator-facing snapshot of the stored credentials. Never carries token material.
 */
export interface CredentialStatus {
  state: TokenState;
  /** Where the record lives (file path or `memory`) */
  credentialsPath: string;
  /** ISO-8601 expiry, when the record has a parseable one */
  expiresAt?: string;
  /** Seconds until expiry; negative once past it */
  expiresInSeconds?: number;
  hasRefreshToken: boolean;
  tokenType?: string;
  scope?: string;
  /** Why the record was classified as corrupted */
  reason?: string;
}
