import { z } from 'zod';

/**
 * Body of a successful `POST /start`.
 *
 * The authorization URL is accepted under `auth_url`, `authorization_url` or `url`.
 */
export const StartResponseSchema = z
  .object({
    auth_url: z.string().url().optional(),
    authorization_url: z.string().url().optional(),
    url: z.string().url().optional(),
    state: z.string().min(1),
    interval: z.number().positive().optional(),
  })
  .transform((body, ctx) => {
    const authorizationUrl = body.auth_url ?? body.authorization_url ?? body.url;
    if (!authorizationUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'auth_url is required',
        path: ['auth_url'],
      });
      return z.NEVER;
    }
    return {
      authorizationUrl,
      state: body.state,
      intervalSeconds: body.interval,
    };
  });

export type StartResponse = z.output<typeof StartResponseSchema>;
