export * from './CredentialRecord.js';
export * from './StoredCredentialRecord.js';
export * from './CredentialStatus.js';
export * from './TokenAssessment.js';
