import { z } from 'zod';
import type { TokenResponse } from '@credential-keeper/models';
import { optional } from '../helpers.js';

/**
 * Longest token lifetime accepted from the helper (10 years)
 */
export const MAX_EXPIRES_IN_SECONDS = 10 * 365 * 24 * 60 * 60;

const seconds = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().nonnegative().max(MAX_EXPIRES_IN_SECONDS));

/**
 * Token fields returned by get-token (when done) and by refresh-token.
 */
export const TokenResponseSchema: z.ZodType<TokenResponse, z.ZodTypeDef, unknown> = z.object({
  access_token: z.string().min(1),
  refresh_token: optional(z.string().min(1)),
  expires_at: optional(z.union([z.string().min(1), z.number()])),
  expires_in: optional(seconds),
  token_type: optional(z.string().min(1)),
  scope: optional(z.string()),
});
