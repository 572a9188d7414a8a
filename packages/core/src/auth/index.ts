import type {
  AuthorizationHandle,
  CredentialRecord,
  OAuthEndpoints,
  StoredCredentialRecord,
} from '@credential-keeper/models';

/**
 * Durable storage of the single credential record
 */
export interface ICredentialStore {
  /** Human-readable location, shown in status output */
  readonly location: string;

  /**
   * Read the stored record
   * @returns The record, or null when nothing is stored
   * @throws When the stored form cannot be parsed (code `corrupted_record`)
   */
  read(): Promise<StoredCredentialRecord | null>;

  /**
   * Replace the stored record atomically
   * @param record - Record to persist
   */
  write(record: CredentialRecord): Promise<void>;

  /**
   * Remove the stored record; a missing record is not an error
   */
  clear(): Promise<void>;
}

/**
 * Options for waiting on a started authorization flow
 */
export interface CompleteAuthorizationOptions {
  /** Abandons the wait; nothing is persisted */
  signal?: AbortSignal;
  /** Upper bound of the wait in milliseconds */
  timeoutMs?: number;
}

/**
 * The three remote operations against the hosted OAuth helper
 */
export interface IOAuthExchangeClient {
  /**
   * Begin a hosted authorization flow
   * @returns URL for the user plus the correlation handle
   */
  startAuthorization(signal?: AbortSignal): Promise<AuthorizationHandle>;

  /**
   * Wait until the flow finishes and return the issued credentials
   */
  completeAuthorization(
    handle: AuthorizationHandle,
    options?: CompleteAuthorizationOptions,
  ): Promise<CredentialRecord>;

  /**
   * Exchange a refresh token for a new access token
   */
  refresh(refreshToken: string, signal?: AbortSignal): Promise<CredentialRecord>;

  /**
   * Static endpoint metadata; no network call
   */
  getEndpoints(): OAuthEndpoints;
}
