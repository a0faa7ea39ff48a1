// src/tools/mise_task_expert_guidance_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, MiseTaskExpertGuidanceParamsSchema } from './mise_task_expert_guidance_params.js';
import { logger } from '../utils/logger.js';
import { jsonResult, type ToolResult } from './tool_result.js';
import guidance from '../data/task-guidance.json';

export const miseTaskExpertGuidanceTool = (server: McpServer): void => {
  const processRequest = async (): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Serving expert guidance`);
    return jsonResult(guidance.expert_guidance);
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, MiseTaskExpertGuidanceParamsSchema.shape, processRequest);
};
