#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './createServer.js';
import { ConfigurationManager } from './config/ConfigurationManager.js';
import { logger } from './utils/index.js';

const main = async (): Promise<void> => {
  try {
    // Load settings once up front so configuration warnings show at startup.
    ConfigurationManager.getInstance();
    const server = createServer();

    const transport = new StdioServerTransport();
    logger.info({ transport: transport.constructor.name }, 'Connecting transport');

    await server.connect(transport);

    logger.info('MCP Server connected and listening');
  } catch (error: unknown) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void main();
