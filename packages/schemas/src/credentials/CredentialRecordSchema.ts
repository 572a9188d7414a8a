import { z } from 'zod';

/**
 * A complete record, as the store writes it.
 */
export const CredentialRecordSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_at: z.string().datetime({ offset: true }),
  token_type: z.string().min(1),
  scope: z.string(),
});
