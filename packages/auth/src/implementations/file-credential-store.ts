import { promises as fs } from 'fs';
import { randomBytes } from 'crypto';
import { basename, dirname, join } from 'path';
import type { CredentialRecord, StoredCredentialRecord } from '@credential-keeper/models';
import { expandHomeDir, logEvent, type ICredentialStore } from '@credential-keeper/core';
import { CredentialError, toError } from '../errors/credential-error.js';
import { parseStoredCredentialRecord, serializeCredentialRecord } from './util/credential-serialization.js';

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Credential store backed by a single JSON file.
 *
 * Writes go to a temp file beside the target and are renamed over it, so a
 * reader sees either the old or the new record. The file is created `0600`,
 * its directory `0700`.
 * @example
 * ```typescript
 * const store = new FileCredentialStore('~/.credential-keeper/credentials.json');
 * await store.write(record);
 * const stored = await store.read();
 * ```
 * @public
 * @see file:./util/credential-serialization.ts - On-disk format
 */
export class FileCredentialStore implements ICredentialStore {
  private readonly filePath: string;

  public constructor(filePath: string) {
    this.filePath = expandHomeDir(filePath);
  }

  public get location(): string {
    return this.filePath;
  }

  public async read(): Promise<StoredCredentialRecord | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw CredentialError.storageError('read', this.filePath, toError(error));
    }

    const record = parseStoredCredentialRecord(text);
    logEvent('debug', 'auth:credentials_read', {
      path: this.filePath,
      hasAccessToken: Boolean(record.access_token),
      hasRefreshToken: Boolean(record.refresh_token),
    });
    return record;
  }

  public async write(record: CredentialRecord): Promise<void> {
    const value = serializeCredentialRecord(record, this.filePath);
    const directory = dirname(this.filePath);
    const tempPath = join(directory, `.${basename(this.filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);

    try {
      await fs.mkdir(directory, { recursive: true, mode: 0o700 });
      await fs.writeFile(tempPath, value, { mode: 0o600, flag: 'wx' });
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      logEvent('error', 'auth:token_store_failed', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw CredentialError.storageError('write', this.filePath, toError(error));
    }

    logEvent('info', 'auth:token_stored', {
      path: this.filePath,
      expiresAt: record.expires_at,
      hasRefreshToken: Boolean(record.refresh_token),
    });
  }

  public async clear(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        throw CredentialError.storageError('clear', this.filePath, toError(error));
      }
    }
    logEvent('info', 'auth:credentials_cleared', { path: this.filePath });
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (cleanupError) {
      logEvent('warn', 'auth:temp_cleanup_failed', {
        path: tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    }
  }
}
