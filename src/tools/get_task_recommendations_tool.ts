// src/tools/get_task_recommendations_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, GetTaskRecommendationsParamsSchema } from './get_task_recommendations_params.js';
import { logger } from '../utils/logger.js';
import { jsonResult, type ToolResult } from './tool_result.js';
import guidance from '../data/task-guidance.json';

export const getTaskRecommendationsTool = (server: McpServer): void => {
  const processRequest = async (): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Serving task recommendations`);
    return jsonResult(guidance.recommendations);
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, GetTaskRecommendationsParamsSchema.shape, processRequest);
};
