import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseDotenv } from 'dotenv';
import { CredentialError } from '@credential-keeper/auth';
import { expandHomeDir, getDefaultCredentialsPath, logEvent } from '@credential-keeper/core';
import { KeeperConfigSchema, type KeeperConfig } from '@credential-keeper/schemas';

export interface LoadKeeperConfigOptions {
  /** Explicit .env file; it must exist. Without it, `.env` in `cwd` is read when present */
  envFile?: string;
  /** Environment to read and to load the .env file into (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Resolved configuration; `credentialsPath` is always set.
 */
export type ResolvedKeeperConfig = KeeperConfig & { credentialsPath: string };

/**
 * Returns the .env path to load, or undefined when there is none.
 * @throws {CredentialError} configuration_error when an explicit file is missing
 * @internal
 */
function resolveEnvFile(options: LoadKeeperConfigOptions): string | undefined {
  if (options.envFile) {
    const explicit = expandHomeDir(options.envFile);
    if (!existsSync(explicit)) {
      throw CredentialError.configurationError([`--env-file: ${explicit} does not exist`]);
    }
    return explicit;
  }
  const local = resolve(options.cwd ?? process.cwd(), '.env');
  return existsSync(local) ? local : undefined;
}

/**
 * Loads the keeper configuration.
 *
 * Variables already present in the environment win over the .env file.
 * @example
 * ```typescript
 * const config = loadKeeperConfig({ envFile: '~/.config/keeper.env' });
 * ```
 * @throws {CredentialError} configuration_error listing every invalid variable
 * @public
 */
export function loadKeeperConfig(options: LoadKeeperConfigOptions = {}): ResolvedKeeperConfig {
  const env = options.env ?? process.env;
  const envFile = resolveEnvFile(options);

  if (envFile) {
    let values: Record<string, string>;
    try {
      values = parseDotenv(readFileSync(envFile));
    } catch (error) {
      throw CredentialError.configurationError([
        `${envFile}: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }
    for (const [key, value] of Object.entries(values)) {
      if (env[key] === undefined) env[key] = value;
    }
  }

  const parsed = KeeperConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw CredentialError.configurationError(problems);
  }

  const config: ResolvedKeeperConfig = {
    ...parsed.data,
    credentialsPath: expandHomeDir(parsed.data.credentialsPath ?? getDefaultCredentialsPath()),
  };

  logEvent('debug', 'config:loaded', {
    envFile,
    oauthBaseUrl: config.oauthBaseUrl,
    credentialsPath: config.credentialsPath,
    hasDeveloperToken: config.developerToken !== undefined,
  });
  return config;
}
