import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { logEvent } from '@credential-keeper/core';
import { describeFailure, errorResult, jsonResult } from '../utils/responses.js';
import type { IKeeperTool, KeeperToolContext } from './keeper-tool.interface.js';

/**
 * Base class for keeper tools.
 *
 * Subclasses return plain data from {@link execute}; it is rendered as JSON
 * text. Anything thrown becomes an `isError` result carrying the error's
 * code, message and suggested action.
 * @public
 */
export abstract class BaseKeeperTool implements IKeeperTool {
  public abstract readonly name: string;
  public abstract readonly tool: Tool;

  protected abstract execute(args: Record<string, unknown>, context: KeeperToolContext): Promise<unknown>;

  public async handle(args: Record<string, unknown>, context: KeeperToolContext): Promise<CallToolResult> {
    try {
      return jsonResult(await this.execute(args, context));
    } catch (error) {
      const failure = describeFailure(error);
      logEvent(failure.code === 'internal_error' ? 'error' : 'warn', 'tool:failed', {
        tool: this.name,
        code: failure.code,
        message: failure.message,
      });
      return errorResult(error);
    }
  }
}
