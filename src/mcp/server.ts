/**
 * wafscope — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerContext } from './context.js';
import { registerIngestTools } from './tools/ingest.js';
import { registerSearchTool } from './tools/search.js';
import { registerGroupTool } from './tools/group.js';
import { registerGeoTool } from './tools/geo.js';
import { registerResources } from './resources.js';

/**
 * Create a fully configured MCP server with all wafscope tools and resources.
 *
 * @param context - Session, geo cache and configuration shared by every handler
 * @returns Configured McpServer instance
 */
export function createMcpServer(context: ServerContext): McpServer {
  const server = new McpServer({
    name: 'wafscope',
    version: '0.1.0',
  });

  // Register tools (5 tools total)
  registerIngestTools(server, context); // ingest_log + refresh
  registerSearchTool(server, context);
  registerGroupTool(server, context);
  registerGeoTool(server, context);

  // Register resources
  registerResources(server, context);

  return server;
}
