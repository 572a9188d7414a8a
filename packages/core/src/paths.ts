import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';

/**
 * Returns the keeper's home directory.
 *
 * Resolves to KEEPER_HOME if set, otherwise ~/.credential-keeper
 * @public
 */
export function getKeeperHome(): string {
  const override = process.env.KEEPER_HOME;
  if (override && override.trim()) return expandHomeDir(override.trim());
  return join(homedir(), '.credential-keeper');
}

/**
 * Expands a leading `~` and resolves the result against the working directory.
 * @param path - Path as written in configuration
 * @public
 */
export function expandHomeDir(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return isAbsolute(path) ? path : resolve(path);
}

/**
 * Default location of the credential file, inside the keeper home.
 * @public
 */
export function getDefaultCredentialsPath(): string {
  return join(getKeeperHome(), 'credentials.json');
}
