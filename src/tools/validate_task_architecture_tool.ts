// src/tools/validate_task_architecture_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  TOOL_NAME,
  TOOL_DESCRIPTION,
  ValidateTaskArchitectureParamsSchema,
  type ValidateTaskArchitectureArgs,
} from './validate_task_architecture_params.js';
import { logger } from '../utils/logger.js';
import { MiseTaskService } from '../services/MiseTaskService.js';
import { analysisErrorResult, jsonResult, type ToolResult } from './tool_result.js';

export const validateTaskArchitectureTool = (server: McpServer): void => {
  const processRequest = async (args: ValidateTaskArchitectureArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Validating ${args.project_path}`);
    try {
      const result = await new MiseTaskService().validateArchitecture(args.project_path);
      logger.info(`[${TOOL_NAME}] ${result.validation_result}: ${result.issues.length} issue(s)`);
      return jsonResult(result);
    } catch (error: unknown) {
      return analysisErrorResult(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, ValidateTaskArchitectureParamsSchema.shape, processRequest);
};
