import type { CredentialRecord } from './CredentialRecord.js';

/**
 * Result of classifying a stored record against the clock
 */
export type TokenAssessment =
  | { state: 'absent' }
  | { state: 'corrupted'; reason: string }
  | { state: 'expired'; record: CredentialRecord; expiresAt: Date }
  | { state: 'valid'; record: CredentialRecord; expiresAt: Date };
