import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Start the MCP stdio transport. stdout carries JSON-RPC from here on, so
 * all logging must stay on stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[RAG] MCP server listening on stdio");
}
