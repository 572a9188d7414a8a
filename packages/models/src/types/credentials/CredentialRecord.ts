/**
 * The persisted credential record.
 *
 * Field names are the on-disk contract and stay snake_case.
 */
export interface CredentialRecord {
  /** Bearer credential for the downstream API */
  access_token: string;
  /** Long-lived token used to mint new access tokens */
  refresh_token?: string;
  /** Absolute access-token expiry, ISO-8601 UTC */
  expires_at: string;
  /** Bearer scheme marker */
  token_type: string;
  /** Space-delimited scopes granted by the authorization server */
  scope: string;
}
