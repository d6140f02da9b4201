#!/usr/bin/env node

/**
 * ROP Render Monitor MCP Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  const config = getConfig();
  printConfigInfo(config);

  const mcpServer = new McpServer(config);
  await mcpServer.start();
  mcpServer.printStats();

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode = 0) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.error(`\nReceived ${signal}, shutting down gracefully...`);

    try {
      await mcpServer.shutdown();
    } catch (error) {
      console.error('Error during shutdown:', error);
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('Uncaught Exception:', error);
    void shutdown('UNCAUGHT_EXCEPTION', 1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection:', reason);
    void shutdown('UNHANDLED_REJECTION', 1);
  });
}

main().catch((error) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
