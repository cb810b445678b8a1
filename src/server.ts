#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { ConfigManager } from './config/index.js';
import { DatabaseConnection } from './database/connection.js';
import { DownloadTools, TOOL_DEFINITIONS } from './mcp/tools.js';
import { createDownloadService } from './service/index.js';
import { logger } from './utils/logger.js';

async function main() {
  const config = ConfigManager.getInstance().getConfig();
  const service = await createDownloadService();
  const tools = new DownloadTools(service);

  service.registerStatusCallback((task, message) => {
    logger().info(message, { id: task.id, name: task.name, status: task.status });
  });

  const server = new Server(
    {
      name: config.server.name,
      version: config.server.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return tools.call(name, args);
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger().info('Shutting down', { signal });
    await service.shutdown();
    DatabaseConnection.getInstance().close();
    process.exit(0);
  };
  process.once('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      logger().error('Shutdown failed', { error });
      process.exit(1);
    });
  });
  process.once('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      logger().error('Shutdown failed', { error });
      process.exit(1);
    });
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger().info('Download manager MCP server is running', { tools: TOOL_DEFINITIONS.length });
}

main().catch((error) => {
  logger().error('Server startup failed', { error });
  process.exit(1);
});
