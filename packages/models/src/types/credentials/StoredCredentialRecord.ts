/**
 * A credential record as read back from storage, before classification.
 *
 * Every field may be missing; `expires_at` may also be epoch seconds.
 */
export interface StoredCredentialRecord {
  access_token?: string;
  refresh_token?: string;
  expires_at?: string | number;
  token_type?: string;
  scope?: string;
}
