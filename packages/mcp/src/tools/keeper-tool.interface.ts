import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { AuthorizationHandle } from '@credential-keeper/models';
import type { TokenOrchestrator } from '@credential-keeper/auth';
import type { AdsApiClient } from '../ads/ads-api-client.js';

/**
 * What a tool call can reach
 */
export interface KeeperToolContext {
  orchestrator: TokenOrchestrator;
  ads: AdsApiClient;
  /** Aborted when the client cancels the request */
  signal?: AbortSignal;
  /** Tells the caller which URL to open when a tool has to wait for authorization */
  onAuthorizationRequired?: (handle: AuthorizationHandle) => Promise<void>;
}

/**
 * Per-request part of the context, supplied by the server for each call
 */
export type ToolRequestContext = Pick<KeeperToolContext, 'signal' | 'onAuthorizationRequired'>;

export interface IKeeperTool {
  readonly name: string;
  readonly tool: Tool;
  handle(args: Record<string, unknown>, context: KeeperToolContext): Promise<CallToolResult>;
}
