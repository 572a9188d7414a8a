import { z } from 'zod';
import { CredentialRecordSchema, StoredCredentialRecordSchema } from './credentials/index.js';

export * from './credentials/index.js';
export * from './exchange/index.js';
export * from './keeper/index.js';
export * from './ads/index.js';

export type CredentialRecordZod = z.infer<typeof CredentialRecordSchema>;
export type StoredCredentialRecordZod = z.infer<typeof StoredCredentialRecordSchema>;
