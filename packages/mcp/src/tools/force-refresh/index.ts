import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { BaseKeeperTool } from '../base-tool.js';
import type { KeeperToolContext } from '../keeper-tool.interface.js';
import { summarizeToken } from '../token-summary.js';

export class ForceRefresh extends BaseKeeperTool {
  public readonly name = 'force_refresh';

  public get tool(): Tool {
    return {
      name: this.name,
      description:
        'Replace the stored access token even if it is still valid. Uses the refresh token, or browser authorization when there is none.',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    };
  }

  protected async execute(_args: Record<string, unknown>, context: KeeperToolContext) {
    await context.orchestrator.forceRefresh({
      signal: context.signal,
      onAuthorizationRequired: context.onAuthorizationRequired,
    });
    return summarizeToken(await context.orchestrator.checkStatus(), true);
  }
}
