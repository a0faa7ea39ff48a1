// src/tools/analyze_project_for_tasks_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  TOOL_NAME,
  TOOL_DESCRIPTION,
  AnalyzeProjectParamsSchema,
  type AnalyzeProjectArgs,
} from './analyze_project_for_tasks_params.js';
import { logger } from '../utils/logger.js';
import { MiseTaskService } from '../services/MiseTaskService.js';
import { analysisErrorResult, jsonResult, type ToolResult } from './tool_result.js';

export const analyzeProjectForTasksTool = (server: McpServer): void => {
  const processRequest = async (args: AnalyzeProjectArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request for ${args.project_path}`);
    try {
      const analysis = await new MiseTaskService().analyzeProject(args.project_path);
      logger.info(
        `[${TOOL_NAME}] Found ${analysis.existing_tasks.length} task(s) and ${analysis.total_recommendations} recommendation(s)`
      );
      return jsonResult(analysis);
    } catch (error: unknown) {
      return analysisErrorResult(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, AnalyzeProjectParamsSchema.shape, processRequest);
};
