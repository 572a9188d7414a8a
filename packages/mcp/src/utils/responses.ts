import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { CredentialError, toError } from '@credential-keeper/auth';
import { AdsApiError } from '../ads/ads-api-error.js';

/**
 * Structured failure carried by an `isError` tool result
 */
export interface ToolFailure {
  code: string;
  message: string;
  action?: string;
  [key: string]: unknown;
}

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
}

export function describeFailure(error: unknown): ToolFailure {
  if (error instanceof CredentialError) {
    return { ...error.toJSON(), code: error.code, message: error.message, action: error.action };
  }
  if (error instanceof AdsApiError) {
    return { ...error.toJSON(), code: error.code, message: error.message, action: error.action };
  }
  if (error instanceof z.ZodError) {
    return {
      code: 'invalid_arguments',
      message: error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; '),
      action: 'Correct the arguments and call the tool again',
    };
  }
  return { code: 'internal_error', message: toError(error).message };
}

export function errorResult(error: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(describeFailure(error), null, 2) }],
    isError: true,
  };
}
