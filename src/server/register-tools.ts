/**
 * Tool Registration
 *
 * Registers every MCP tool on a given McpServer instance, bound to one
 * server context.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { createJobTools } from '../tools/jobs.js';
import { createProtocolTools } from '../tools/protocol.js';
import type { ToolDefinition } from '../tools/shared.js';
import type { ServerContext } from './context.js';

/** All tool modules in registration order */
export function buildToolModules(ctx: ServerContext): Record<string, ToolDefinition>[] {
  return [createJobTools(ctx), createProtocolTools(ctx)];
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if two modules define the same tool name
 */
export function registerAllTools(server: McpServer, ctx: ServerContext): number {
  const registeredToolNames = new Set<string>();

  for (const toolModule of buildToolModules(ctx)) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }

  return registeredToolNames.size;
}
