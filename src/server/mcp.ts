/**
 * MCP Endpoint Handler
 *
 * Thin handler that mounts the MCP server onto the /mcp endpoint.
 * Delegates to @/mcp/server for server creation and tool implementation.
 */

import type { Context } from 'hono';
import { createMcpServer, type McpHandler } from '@/mcp/server';
import { getAgent } from './clients';

/** Cached MCP handler */
let mcpHandler: McpHandler | null = null;

/**
 * Handle MCP endpoint requests.
 *
 * Lazily initializes the MCP server on first request.
 * Subsequent requests reuse the cached handler.
 */
export async function handleMcp(c: Context): Promise<Response> {
  if (!mcpHandler) {
    const agent = await getAgent();
    mcpHandler = createMcpServer({ ask: (question) => agent.ask(question) });
  }

  return mcpHandler(c);
}
