#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig, log } from './config.js';
import { HttpInsightsClient } from './insights/client.js';
import { createResources } from './resources/index.js';
import { SizeTracker } from './telemetry/sizeTracker.js';
import { createToolRegistry } from './tools/index.js';
import { createMcpServer } from './transports/mcp.js';

const config = getConfig();

log(`Starting Insights MCP Server`);
log(`Environment: ${config.env}`);
log(`Upstream: ${config.apiUrl}`);
log(`Size log: ${config.sizeLogFile}`);

const client = new HttpInsightsClient({ baseUrl: config.apiUrl, token: config.apiToken });

const registry = createToolRegistry({
  client,
  tracker: new SizeTracker(config.sizeLogFile),
});

const server = createMcpServer(registry, createResources(client));

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log('Insights MCP Server running on stdio');
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
