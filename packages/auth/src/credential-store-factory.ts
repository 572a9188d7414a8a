import { getDefaultCredentialsPath, logEvent, type ICredentialStore } from '@credential-keeper/core';
import { FileCredentialStore } from './implementations/file-credential-store.js';
import { MemoryCredentialStore } from './implementations/memory-credential-store.js';

/**
 * Where the credential record is kept
 * @public
 */
export type CredentialStoreType = 'file' | 'memory';

/**
 * Creates credential stores.
 * @example
 * ```typescript
 * const store = CredentialStoreFactory.create('file', config.credentialsPath);
 * const scratch = CredentialStoreFactory.create('memory');
 * ```
 * @public
 */
export class CredentialStoreFactory {
  /**
   * @param type - Store kind
   * @param path - Credential file; the keeper home default when omitted
   */
  public static create(type: CredentialStoreType = 'file', path?: string): ICredentialStore {
    switch (type) {
      case 'memory':
        logEvent('debug', 'auth:storage_created', { type });
        return new MemoryCredentialStore();

      case 'file': {
        const store = new FileCredentialStore(path ?? getDefaultCredentialsPath());
        logEvent('debug', 'auth:storage_created', { type, path: store.location });
        return store;
      }

      default: {
        const _exhaustive: never = type;
        throw new Error(`Unsupported storage type: ${String(_exhaustive)}`);
      }
    }
  }
}
