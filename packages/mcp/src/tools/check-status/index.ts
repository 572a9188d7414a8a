import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { BaseKeeperTool } from '../base-tool.js';
import type { KeeperToolContext } from '../keeper-tool.interface.js';

export class CheckStatus extends BaseKeeperTool {
  public readonly name = 'check_status';

  public get tool(): Tool {
    return {
      name: this.name,
      description:
        'Report whether stored OAuth credentials exist and are valid, expired or corrupted. Makes no network calls.',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    };
  }

  protected async execute(_args: Record<string, unknown>, context: KeeperToolContext) {
    return context.orchestrator.checkStatus();
  }
}
