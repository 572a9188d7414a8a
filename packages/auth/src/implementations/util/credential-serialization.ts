import type { CredentialRecord, StoredCredentialRecord } from '@credential-keeper/models';
import { CredentialRecordSchema, StoredCredentialRecordSchema } from '@credential-keeper/schemas';
import { CredentialError, toError } from '../../errors/credential-error.js';

/**
 * Serializes a record for storage, with a stable key order.
 * @throws {CredentialError} storage_error when the record is incomplete
 * @internal
 */
export function serializeCredentialRecord(record: CredentialRecord, location: string): string {
  const checked = CredentialRecordSchema.safeParse(record);
  if (!checked.success) {
    const fields = checked.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw CredentialError.storageError('write', location, new Error(`incomplete record (${fields})`));
  }

  const { access_token, refresh_token, expires_at, token_type, scope } = checked.data;
  return (
    JSON.stringify(
      {
        access_token,
        ...(refresh_token ? { refresh_token } : {}),
        expires_at,
        token_type,
        scope,
      },
      null,
      2,
    ) + '\n'
  );
}

/**
 * Parses the stored document.
 * @throws {CredentialError} corrupted_record when it is not JSON or not a record
 * @internal
 */
export function parseStoredCredentialRecord(text: string): StoredCredentialRecord {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw CredentialError.corruptedRecord('not valid JSON', toError(error));
  }

  const result = StoredCredentialRecordSchema.safeParse(document);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw CredentialError.corruptedRecord(detail);
  }
  return result.data;
}
