/**
 * Imaging Protocol Extractor MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadProtocolConfig } from './server/config.js';
import { createServerContext, type ServerContext } from './server/context.js';
import { registerAllTools } from './server/register-tools.js';

/**
 * Load the first .env that exists: PROTOCOL_ENV_FILE, then the working
 * directory, then the package root. Returns the file used, if any.
 */
function loadEnvFile(): string | null {
  const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
  const candidates = [
    process.env.PROTOCOL_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.join(packageRoot, '.env'),
  ];
  const found = candidates.find((p): p is string => typeof p === 'string' && fs.existsSync(p));
  if (!found) return null;
  dotenv.config({ path: found, quiet: true });
  return found;
}

const server = new McpServer({
  name: 'imaging-protocol-extractor',
  version: '1.0.0',
});

let context: ServerContext | null = null;

// =============================================================================
// SERVER STARTUP
// =============================================================================

async function main(): Promise<void> {
  const envFile = loadEnvFile();
  const config = loadProtocolConfig();
  context = createServerContext(config);
  const toolCount = registerAllTools(server, context);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Imaging Protocol Extractor MCP Server running on stdio');
  console.error(`Tools registered: ${toolCount}`);
  console.error(`Environment file: ${envFile ?? '(none)'}`);
  console.error(`Job store: ${context.store.getPath()}`);
  console.error(`Text-understanding endpoint: ${config.llm.baseUrl} (${config.llm.model})`);
}

function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      context?.close();
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err: unknown) => {
      console.error(`[Shutdown] Error closing server: ${String(err)}`);
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

main().catch((error: unknown) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
