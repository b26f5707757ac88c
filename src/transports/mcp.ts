// ============================================================================
// MCP Server Factory
// ============================================================================
// Creates an MCP Server with tool and resource handlers wired to the given
// registries.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { log } from '../config.js';
import type { ResourceSpec } from '../resources/index.js';
import { toolError } from '../tools/shared/index.js';
import type { ToolRegistry } from '../tools/index.js';

export const SERVER_INFO = { name: 'insights-query-mcp', version: '0.1.0' };

export function createMcpServer(registry: ToolRegistry, resources: ResourceSpec[]): Server {
  const server = new Server(SERVER_INFO, {
    capabilities: {
      tools: {},
      resources: {},
    },
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: registry.tools.map(t => t.definition) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    log(`Tool called: ${name}`);
    log(`Arguments:`, JSON.stringify(args, null, 2));

    try {
      const tool = registry.toolMap.get(name);
      if (!tool) {
        throw new Error(`Unknown tool: ${name}`);
      }
      return await tool.handler(args ?? {});
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      log(`Error in tool ${name}:`, errorMessage);
      return toolError(errorMessage);
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: resources.map(({ uri, name, description, mimeType }) => ({ uri, name, description, mimeType })),
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const resource = resources.find(r => r.uri === uri);
    if (!resource) {
      throw new Error(`Unknown resource: ${uri}`);
    }
    return {
      contents: [{ uri, mimeType: resource.mimeType, text: await resource.read() }],
    };
  });

  return server;
}
