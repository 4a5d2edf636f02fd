/**
 * MCP Server
 *
 * Creates the gene graph MCP server with the ask_gene_graph tool.
 * Uses stateless Streamable HTTP transport for simple request/response operations.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { WebStandardStreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js';
import type { Context } from 'hono';
import { z } from 'zod';
import type { AgentAnswer } from '@/core';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

interface McpServerDeps {
  ask: (question: string) => Promise<AgentAnswer>;
}

/**
 * Handler function type returned by createMcpServer.
 */
export type McpHandler = (c: Context) => Promise<Response>;

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════════
// Tool Definition
// ═══════════════════════════════════════════════════════════════════════════════

const ASK_DESCRIPTION = `Answer a question about genes from a knowledge graph built from KEGG pathway maps and GO annotations.

Two kinds of question are supported:
- Disease association: whether a gene (by name or symbol) is associated with a disease pathway
  e.g. "Is gene GNAI1 associated with Parkinson disease?"
- Downstream interaction: what a gene interacts with downstream in a disease pathway
  e.g. "What are the downstream interactions of PRKN in the Parkinson disease pathway?"

Answers use only what the graph contains. When nothing matches, the tool says so.`;

const askInputSchema = {
  question: z.string().min(1).describe('The question, naming the gene and, where relevant, the disease')
};

// ═══════════════════════════════════════════════════════════════════════════════
// Tool Handler
// ═══════════════════════════════════════════════════════════════════════════════

export function toToolResult(result: AgentAnswer): ToolResult {
  if (result.status === 'failed') {
    return {
      content: [{ type: 'text' as const, text: result.answer }],
      isError: true
    };
  }
  return {
    content: [{ type: 'text' as const, text: result.answer }]
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Server Factory
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Creates the MCP server.
 *
 * Uses stateless transport - each request is independent.
 *
 * @returns Request handler for the /mcp endpoint
 */
export function createMcpServer(deps: McpServerDeps): McpHandler {
  const mcpServer = new McpServer({
    name: 'genegraph',
    version: '0.1.0'
  });

  mcpServer.registerTool(
    'ask_gene_graph',
    {
      description: ASK_DESCRIPTION,
      inputSchema: askInputSchema
    },
    async ({ question }: { question: string }): Promise<ToolResult> => toToolResult(await deps.ask(question))
  );

  /**
   * Request handler for the /mcp endpoint.
   *
   * Supports:
   * - POST: Tool calls, initialization (Streamable HTTP)
   * - GET: Not supported in stateless mode (would be SSE for notifications)
   * - DELETE: Not supported in stateless mode (session termination)
   */
  return async function handleRequest(c: Context): Promise<Response> {
    // Create a new stateless transport for each request
    const transport = new WebStandardStreamableHTTPServerTransport({
      sessionIdGenerator: undefined, // Stateless mode
      enableJsonResponse: true // Return JSON instead of SSE for simple requests
    });

    await mcpServer.connect(transport);

    try {
      return await transport.handleRequest(c.req.raw);
    } finally {
      await transport.close();
    }
  };
}
