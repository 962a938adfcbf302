#!/usr/bin/env node

/**
 * Keep Notes Exporter MCP Server
 *
 * Exposes tools that export Google Keep notes into a folder of Markdown files
 * and import Markdown files back as notes.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './utils/logger.js';
import { loadConfig } from './config/index.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';

async function main(): Promise<void> {
  // Bad configuration is fatal before anything is served
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  logger.info('Starting Keep Notes Exporter MCP Server', {
    exportPath: config.exportPath,
    takeoutPath: config.takeoutPath,
    logLevel: logger.getLevel(),
  });

  // Create MCP server
  const server = new Server(
    {
      name: 'keep-notes-exporter',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool listing handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    try {
      const result = await handleToolCall(name, args ?? {});
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: !result.success,
      };
    } catch (error) {
      logger.error(`Tool error: ${name}`, error);
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: error instanceof Error ? error.message : String(error),
            }),
          },
        ],
        isError: true,
      };
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Server connected with stdio transport');
}

// Graceful shutdown handler
function shutdown(): void {
  logger.info('Shutting down...');
  process.exit(0);
}

// Register shutdown handlers
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Run the server
main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
