/**
 * MCP protocol wiring
 *
 * Uses the low-level SDK Server so tools/call goes through the registry's
 * dispatcher, including for names the registry does not know.
 *
 * @module server/mcp
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { SERVER_NAME, SERVER_VERSION } from './config.js';

export function createMcpServer(registry: ToolRegistry): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    registry.callTool(request.params.name, request.params.arguments)
  );

  return server;
}
