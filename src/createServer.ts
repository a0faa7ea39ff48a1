import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTools } from './tools/index.js';
import { logger } from './utils/index.js';

export const SERVER_NAME = 'mise-task-graph-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Creates and configures an MCP server instance with every task graph tool registered.
 */
export function createServer(): McpServer {
  logger.info('Creating MCP server instance');

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerTools(server);

  logger.info('MCP server instance created and tools registered successfully');
  return server;
}
