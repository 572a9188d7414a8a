import { z } from 'zod';
import { optional } from '../helpers.js';

/**
 * Shape of the credential file as read back from disk.
 *
 * Every field is optional so that the evaluator, not the parser, decides between
 * absent and corrupted. Unknown fields are stripped.
 */
export const StoredCredentialRecordSchema = z.object({
  access_token: optional(z.string()),
  refresh_token: optional(z.string()),
  expires_at: optional(z.union([z.string(), z.number()])),
  token_type: optional(z.string()),
  scope: optional(z.string()),
});
