import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { BaseKeeperTool } from '../base-tool.js';
import type { KeeperToolContext } from '../keeper-tool.interface.js';
import { summarizeToken } from '../token-summary.js';

export class EnsureToken extends BaseKeeperTool {
  public readonly name = 'ensure_token';

  public get tool(): Tool {
    return {
      name: this.name,
      description:
        'Make sure a valid access token is stored, refreshing it or starting browser authorization when needed. ' +
        'When authorization is required the URL to open is sent as a log message and printed on the server console; ' +
        'the call waits up to KEEPER_AUTH_TIMEOUT_SECONDS, so raise the client request timeout or run `credential-keeper login` first. ' +
        'The token itself is never returned.',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    };
  }

  protected async execute(_args: Record<string, unknown>, context: KeeperToolContext) {
    const before = await context.orchestrator.checkStatus();
    await context.orchestrator.ensureToken({
      signal: context.signal,
      onAuthorizationRequired: context.onAuthorizationRequired,
    });
    const after = await context.orchestrator.checkStatus();
    return summarizeToken(after, before.state !== 'valid' || before.expiresAt !== after.expiresAt);
  }
}
