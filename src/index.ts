#!/usr/bin/env node
/**
 * School Data MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes read-only SQL over school/neighborhood data and semantic search
 * over school websites via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. SCHOOL_DATA_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.SCHOOL_DATA_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
  path.resolve(__dirname, '..', '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadServerConfig } from './server/config.js';
import { initializeServerContext, type ServerContext } from './server/context.js';
import { createMcpServer } from './server/mcp.js';
import { createToolRegistry } from './tools/registry.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

let context: ServerContext | null = null;
let server: ReturnType<typeof createMcpServer> | null = null;

async function main(): Promise<void> {
  const config = loadServerConfig(process.env, process.argv.slice(2));
  console.error(`[Startup] Schools database: ${config.schoolsDbPath}`);
  console.error(`[Startup] Websites vector store: ${config.websitesDbPath} (table ${config.websitesTable})`);
  console.error(`[Startup] Embedding model ${config.embedding.model} at ${config.embedding.endpoint}`);
  console.error(`[Startup] Reranker model ${config.reranker.model} at ${config.reranker.endpoint}`);

  context = initializeServerContext(config);
  const registry = createToolRegistry(context);
  server = createMcpServer(registry);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`School Data MCP Server running on stdio`);
  console.error(`Tools registered: ${registry.size}`);
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  const closing = server ? server.close() : Promise.resolve();
  closing
    .then(() => {
      context?.close();
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err) => {
      console.error(`[Shutdown] Error closing server: ${err}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error instanceof Error ? error.message : error);
  context?.close();
  process.exit(1);
});
