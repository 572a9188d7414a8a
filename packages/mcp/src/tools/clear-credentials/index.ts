import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { BaseKeeperTool } from '../base-tool.js';
import type { KeeperToolContext } from '../keeper-tool.interface.js';

export class ClearCredentials extends BaseKeeperTool {
  public readonly name = 'clear_credentials';

  public get tool(): Tool {
    return {
      name: this.name,
      description: 'Delete the stored credentials. The next ensure_token starts a new authorization.',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    };
  }

  protected async execute(_args: Record<string, unknown>, context: KeeperToolContext) {
    await context.orchestrator.clearCredentials();
    const status = await context.orchestrator.checkStatus();
    return { cleared: true, credentialsPath: status.credentialsPath };
  }
}
