export * from './CredentialRecordSchema.js';
export * from './StoredCredentialRecordSchema.js';
