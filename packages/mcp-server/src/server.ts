/**
 * MCP server exposing the tool table over the Model Context Protocol.
 * Tool listing and dispatch both go through the same ToolRegistry the
 * chat agent uses.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { ToolContext, ToolRegistry } from "@repodocs/core";

export const SERVER_NAME = "repodocs";
export const SERVER_VERSION = "0.1.0";

export function createDocsMcpServer(
  tools: ToolRegistry,
  context: ToolContext = { sessionId: "mcp" }
): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: tools.getDefinitions().map((definition) => ({
        name: definition.function.name,
        description: definition.function.description,
        inputSchema: {
          type: "object" as const,
          properties: definition.function.parameters.properties,
          required: definition.function.parameters.required,
        },
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = await tools.execute(name, args ?? {}, context);

    if (!result.success) {
      return {
        content: [{ type: "text" as const, text: result.error ?? "Tool failed" }],
        isError: true,
      };
    }

    return {
      content: [{ type: "text" as const, text: result.output }],
    };
  });

  return server;
}
