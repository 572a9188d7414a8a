import { z } from 'zod';

/**
 * get-token body while the user has not finished the flow yet.
 */
export const PendingStatusSchema = z.object({
  status: z.enum(['pending', 'authorization_pending']),
});

/**
 * get-token body reporting that the flow ended without credentials.
 */
export const FailedStatusSchema = z.object({
  status: z.enum(['error', 'denied']),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

/**
 * RFC 6749 section 5.2 error body.
 */
export const OAuthErrorBodySchema = z.object({
  error: z.string().min(1),
  error_description: z.string().optional(),
});

export type OAuthErrorBody = z.infer<typeof OAuthErrorBodySchema>;
