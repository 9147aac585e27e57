/**
 * MCP Tool Registration
 *
 * Registers the QuickBooks Time API, engine and workflow tools with the MCP
 * server
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { apiTools } from './api-tools.js';
import { engineTools } from './engine-tools.js';
import { respond, type ToolContext, type ToolDefinition } from './shared.js';
import { workflowTools } from './workflow-tools.js';

export { defineTool, respond } from './shared.js';
export type { ToolContext, ToolDefinition, ToolResponse } from './shared.js';

export function buildTools(ctx: ToolContext): ToolDefinition[] {
  return [...apiTools(ctx), ...engineTools(ctx), ...workflowTools(ctx)];
}

export function registerTools(server: McpServer, ctx: ToolContext): void {
  const tools = buildTools(ctx);
  for (const tool of tools) {
    server.tool(tool.name, tool.description, tool.schema, async (args, extra) =>
      respond(tool, args, ctx.logger, extra.signal)
    );
  }

  ctx.logger.debug(`Registered ${tools.length} tools`);
}
