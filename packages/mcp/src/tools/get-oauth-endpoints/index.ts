import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { BaseKeeperTool } from '../base-tool.js';
import type { KeeperToolContext } from '../keeper-tool.interface.js';

export class GetOAuthEndpoints extends BaseKeeperTool {
  public readonly name = 'get_oauth_endpoints';

  public get tool(): Tool {
    return {
      name: this.name,
      description: 'Show the OAuth helper endpoints this server talks to.',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    };
  }

  protected async execute(_args: Record<string, unknown>, context: KeeperToolContext) {
    return context.orchestrator.getOAuthEndpoints();
  }
}
