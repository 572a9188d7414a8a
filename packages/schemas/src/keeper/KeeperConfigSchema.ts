import { z } from 'zod';
import { blankAsUndefined } from '../helpers.js';

const seconds = (fallback: number, { allowZero = false } = {}) =>
  blankAsUndefined(
    (allowZero ? z.coerce.number().nonnegative() : z.coerce.number().positive()).default(fallback),
  ).transform((value) => Math.round(value * 1000));

const text = blankAsUndefined(z.string().trim().optional());

const url = (fallback?: string) =>
  blankAsUndefined(
    fallback === undefined ? z.string().trim().url() : z.string().trim().url().default(fallback),
  );

/**
 * Environment variables read by the keeper, before mapping to {@link KeeperConfig}.
 */
export const KeeperEnvSchema = z.object({
  KEEPER_OAUTH_BASE_URL: url(),
  KEEPER_CREDENTIALS_PATH: text,
  KEEPER_SKEW_SECONDS: seconds(300, { allowZero: true }),
  KEEPER_AUTH_TIMEOUT_SECONDS: seconds(300),
  KEEPER_POLL_INTERVAL_SECONDS: seconds(2),
  KEEPER_HTTP_TIMEOUT_SECONDS: seconds(30),
  KEEPER_OAUTH_SCOPE: text,
  KEEPER_DEVELOPER_TOKEN: text,
  KEEPER_ADS_API_BASE: url('https://googleads.googleapis.com'),
  KEEPER_ADS_API_VERSION: blankAsUndefined(
    z
      .string()
      .trim()
      .regex(/^v\d+$/, 'must look like v22')
      .default('v22'),
  ),
});

const stripQuotes = (value: string | undefined) => {
  const stripped = value?.replace(/^(['"])(.*)\1$/, '$2').trim();
  return stripped ? stripped : undefined;
};

/**
 * Validated keeper configuration, durations in milliseconds.
 * @example
 * ```typescript
 * const config = KeeperConfigSchema.parse(process.env);
 * config.skewWindowMs; // 300000 unless KEEPER_SKEW_SECONDS is set
 * ```
 */
export const KeeperConfigSchema = KeeperEnvSchema.transform((env) => ({
  oauthBaseUrl: env.KEEPER_OAUTH_BASE_URL.replace(/\/+$/, ''),
  credentialsPath: env.KEEPER_CREDENTIALS_PATH,
  skewWindowMs: env.KEEPER_SKEW_SECONDS,
  authTimeoutMs: env.KEEPER_AUTH_TIMEOUT_SECONDS,
  pollIntervalMs: env.KEEPER_POLL_INTERVAL_SECONDS,
  requestTimeoutMs: env.KEEPER_HTTP_TIMEOUT_SECONDS,
  scope: env.KEEPER_OAUTH_SCOPE,
  developerToken: stripQuotes(env.KEEPER_DEVELOPER_TOKEN),
  adsApiBase: env.KEEPER_ADS_API_BASE.replace(/\/+$/, ''),
  adsApiVersion: env.KEEPER_ADS_API_VERSION,
}));

export type KeeperConfig = z.output<typeof KeeperConfigSchema>;
