/**
 * Token fields returned by the get-token and refresh-token endpoints
 */
export interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  /** Absolute expiry, ISO string or epoch seconds */
  expires_at?: string | number;
  /** Lifetime in seconds, used when `expires_at` is absent */
  expires_in?: number;
  token_type?: string;
  scope?: string;
}
