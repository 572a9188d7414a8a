import { CheckStatus } from './check-status/index.js';
import { ClearCredentials } from './clear-credentials/index.js';
import { EnsureToken } from './ensure-token/index.js';
import { ForceRefresh } from './force-refresh/index.js';
import { GetOAuthEndpoints } from './get-oauth-endpoints/index.js';
import { KeywordIdeas } from './keyword-ideas/index.js';
import { ListAccounts } from './list-accounts/index.js';
import { RunQuery } from './run-query/index.js';
import type { IKeeperTool } from './keeper-tool.interface.js';

export * from './keeper-tool.interface.js';
export * from './base-tool.js';
export {
  CheckStatus,
  ClearCredentials,
  EnsureToken,
  ForceRefresh,
  GetOAuthEndpoints,
  KeywordIdeas,
  ListAccounts,
  RunQuery,
};

export function createKeeperTools(): IKeeperTool[] {
  return [
    new CheckStatus(),
    new EnsureToken(),
    new ForceRefresh(),
    new ClearCredentials(),
    new GetOAuthEndpoints(),
    new ListAccounts(),
    new RunQuery(),
    new KeywordIdeas(),
  ];
}
