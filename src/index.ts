#!/usr/bin/env node

/**
 * TimeLedger MCP Server
 *
 * Local time tracking over MCP: start and stop timers, edit history, daily
 * totals and CSV export, all kept in a SQLite file.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './utils/logger.js';
import { getConfig } from './config/index.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';
import { getStoreManager, resetStoreManager } from './services/store/manager.js';
import { getSessionController } from './services/session/index.js';

async function main(): Promise<void> {
  const config = getConfig();
  logger.setLevel(config.logLevel);

  logger.info('Starting TimeLedger MCP Server', {
    dbPath: config.dbPath,
    exportDir: config.exportDir,
    logLevel: config.logLevel,
  });

  // Open the store up front so a bad path fails at startup
  await getStoreManager().getStore();
  const running = (await getSessionController()).refresh();
  if (running) {
    logger.info(`Timer running since ${running.start}: ${running.project} / ${running.task}`);
  }

  const server = new Server(
    {
      name: 'timeledger-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    const result = await handleToolCall(name, args ?? {});
    if (!result.success) {
      logger.warn(`Tool failed: ${name}`, { code: result.code, error: result.error });
    }

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2),
        },
      ],
      ...(result.success ? {} : { isError: true }),
    };
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Server connected with stdio transport');
}

// The running entry is left open on exit; it keeps counting until stopped
function shutdown(): void {
  logger.info('Shutting down...');
  resetStoreManager();
  logger.info('Shutdown complete');
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
