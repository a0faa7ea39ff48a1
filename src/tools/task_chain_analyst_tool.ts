// src/tools/task_chain_analyst_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, TaskChainAnalystParamsSchema } from './task_chain_analyst_params.js';
import { logger } from '../utils/logger.js';
import { jsonResult, type ToolResult } from './tool_result.js';
import guidance from '../data/task-guidance.json';

export const taskChainAnalystTool = (server: McpServer): void => {
  const processRequest = async (): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Serving chain analysis guidance`);
    return jsonResult(guidance.chain_analysis);
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, TaskChainAnalystParamsSchema.shape, processRequest);
};
