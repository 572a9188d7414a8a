import type { CredentialRecord, StoredCredentialRecord } from '@credential-keeper/models';
import { logEvent, type ICredentialStore } from '@credential-keeper/core';
import { parseStoredCredentialRecord, serializeCredentialRecord } from './util/credential-serialization.js';

/**
 * In-memory credential store, lost on restart.
 *
 * Keeps the serialized form so reads go through the same parsing as the file store.
 */
export class MemoryCredentialStore implements ICredentialStore {
  public readonly location = 'memory';
  private document: string | null = null;

  public constructor(initial?: CredentialRecord) {
    if (initial) {
      this.document = serializeCredentialRecord(initial, this.location);
    }
  }

  public async read(): Promise<StoredCredentialRecord | null> {
    return this.document === null ? null : parseStoredCredentialRecord(this.document);
  }

  public async write(record: CredentialRecord): Promise<void> {
    this.document = serializeCredentialRecord(record, this.location);
    logEvent('info', 'auth:token_stored', {
      path: this.location,
      expiresAt: record.expires_at,
      hasRefreshToken: Boolean(record.refresh_token),
    });
  }

  public async clear(): Promise<void> {
    this.document = null;
    logEvent('info', 'auth:credentials_cleared', { path: this.location });
  }
}
