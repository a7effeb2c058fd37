#!/usr/bin/env node
import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { loadConfigOrExit } from './config.js';
import { TeamResolver } from './matching/resolver.js';
import { createMappingStore } from './store/index.js';
import { createAlerter } from './utils/alerting.js';
import { createTools, handleToolCall } from './tools/index.js';
import { startHttpServer } from './http/server.js';

// Check if running in HTTP-only mode
const httpOnlyMode = process.argv.includes('--http-only');

const config = loadConfigOrExit();

async function main() {
  const resolver = await TeamResolver.create({
    store: createMappingStore(config),
    overrideFile: config.manualMappingsFile,
    learnMappings: config.learnMappings,
    defaultReportDays: config.reportWindowDays,
    alerter: createAlerter({ discordWebhookUrl: config.discordWebhookUrl }),
  });

  const server = new Server(
    {
      name: 'team-identity',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: createTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(resolver, request.params.name, request.params.arguments ?? {});
  });

  const http = await startHttpServer(resolver, config.http);

  const shutdown = async () => {
    await http.close();
    await resolver.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  // Start stdio MCP server unless in HTTP-only mode
  if (!httpOnlyMode) {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error('Team identity MCP server running on stdio');
  } else {
    console.error('Running in HTTP-only mode (no stdio MCP)');
  }
}

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
