import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AuthorizationHandle } from '@credential-keeper/models';
import { logEvent } from '@credential-keeper/core';
import type { TokenOrchestrator } from '@credential-keeper/auth';
import type { AdsApiClient } from '../ads/ads-api-client.js';
import { createKeeperTools, type IKeeperTool, type ToolRequestContext } from '../tools/index.js';

export const SERVER_INFO = {
  name: 'credential-keeper',
  version: '0.1.0',
} as const;

/**
 * Text shown to the user when a tool call has to wait for browser authorization
 */
export function authorizationNotice(handle: AuthorizationHandle): string {
  return `[keeper] Authorization required. Open this URL to continue:\n${handle.authorizationUrl}`;
}

export interface KeeperServerOptions {
  orchestrator: TokenOrchestrator;
  ads: AdsApiClient;
  tools?: IKeeperTool[];
  /** Receives authorization prompts; stdout belongs to the protocol */
  notice?: (message: string) => void;
}

/**
 * MCP server exposing the credential and Google Ads tools.
 * @public
 */
export class KeeperServer {
  private readonly _server: Server;
  private readonly tools = new Map<string, IKeeperTool>();
  private readonly orchestrator: TokenOrchestrator;
  private readonly ads: AdsApiClient;
  private readonly unsubscribe: () => void;

  public constructor(options: KeeperServerOptions) {
    this.orchestrator = options.orchestrator;
    this.ads = options.ads;
    for (const tool of options.tools ?? createKeeperTools()) {
      this.tools.set(tool.name, tool);
    }

    const notice = options.notice ?? ((message: string) => console.error(message));
    this.unsubscribe = this.orchestrator.on('authorization:required', (handle: AuthorizationHandle) => {
      notice(authorizationNotice(handle));
    });

    this._server = new Server(SERVER_INFO, {
      capabilities: {
        tools: {},
        logging: {},
      },
    });
    this.setupRequestHandlers();
  }

  public get server(): Server {
    return this._server;
  }

  public get toolNames(): string[] {
    return [...this.tools.keys()];
  }

  private setupRequestHandlers() {
    this._server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [...this.tools.values()].map((tool) => tool.tool),
    }));

    // the authorization URL also goes to the caller, who may not see the server's stderr
    this._server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      return this.callTool(request.params.name, request.params.arguments ?? {}, {
        signal: extra.signal,
        onAuthorizationRequired: (handle) =>
          extra.sendNotification({
            method: 'notifications/message',
            params: { level: 'notice', logger: SERVER_INFO.name, data: authorizationNotice(handle) },
          }),
      });
    });
  }

  /**
   * Runs one tool; unknown names yield an error result
   */
  public async callTool(
    name: string,
    args: Record<string, unknown>,
    request: ToolRequestContext = {},
  ): Promise<CallToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return {
        content: [{ type: 'text', text: `Tool not found: ${name}` }],
        isError: true,
      };
    }
    logEvent('debug', 'tool:call', { tool: name });
    return tool.handle(args, { ...request, orchestrator: this.orchestrator, ads: this.ads });
  }

  public async start(transport: Transport = new StdioServerTransport()): Promise<Server> {
    await this._server.connect(transport);
    logEvent('info', 'server:started', { tools: this.toolNames });
    return this._server;
  }

  public async shutdown(): Promise<void> {
    this.unsubscribe();
    await this._server.close();
    logEvent('info', 'server:stopped');
  }
}
