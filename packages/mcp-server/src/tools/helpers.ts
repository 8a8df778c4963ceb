/**
 * Shared plumbing for tool handlers: result formatting, VaultError mapping
 * and the one-shot context block.
 */

import type { McpServer, RegisteredTool } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Operations } from '../core/write/operations.js';
import { isVaultError } from '../core/shared/errors.js';
import { serverLog } from '../core/shared/serverLog.js';

export interface ToolContext {
  server: McpServer;
  ops: Operations;
  /** Registered tools by name, read by get_help */
  catalog: Map<string, RegisteredTool>;
  /** Adds the context block to the first successful result of the session */
  decorate: (result: CallToolResult) => Promise<CallToolResult>;
}

export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Run a tool body. Vault errors become an isError result carrying the error
 * code; anything else is a bug and propagates to the SDK.
 */
export async function runTool(ctx: ToolContext, tool: string, body: () => Promise<CallToolResult>): Promise<CallToolResult> {
  let result: CallToolResult;
  try {
    result = await body();
  } catch (err) {
    if (!isVaultError(err)) throw err;

    serverLog('server', `${tool} failed: ${err.message}`, 'warn');
    return {
      content: [{ type: 'text', text: JSON.stringify({ error: err.message, code: err.code }, null, 2) }],
      isError: true,
    };
  }
  return ctx.decorate(result);
}
