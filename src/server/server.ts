/**
 * MCP server wiring: lists the registered tools with JSON schemas derived from their Zod
 * shapes and dispatches tool calls to their handlers over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import * as z from 'zod';
import { tools } from '../mcp/tools/index.ts';
import type { ToolDefinition } from '../utils/typed-tool-factory.ts';
import { createErrorResponse } from '../utils/responses/index.ts';
import { log } from '../utils/logger.ts';
import { version } from '../version.ts';

export function describeTool(tool: ToolDefinition) {
  const jsonSchema = z.toJSONSchema(z.object(tool.schema));
  const properties: Record<string, object> = {};
  for (const [key, value] of Object.entries(jsonSchema.properties ?? {})) {
    if (typeof value === 'object') {
      properties[key] = value;
    }
  }
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: {
      type: 'object' as const,
      properties,
      required: jsonSchema.required ?? [],
    },
    annotations: tool.annotations,
  };
}

export function createServer(registered: ToolDefinition[] = tools): Server {
  const server = new Server(
    {
      name: 'gdb-triage-mcp',
      version,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  const toolsByName = new Map(registered.map((tool) => [tool.name, tool]));

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registered.map(describeTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const tool = toolsByName.get(name);
    if (!tool) {
      return createErrorResponse(`Tool not found: ${name}`);
    }
    log('debug', `Calling tool ${name}`);
    return tool.handler(args ?? {});
  });

  return server;
}

export async function startServer(server: Server): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
