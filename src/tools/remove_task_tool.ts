// src/tools/remove_task_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, RemoveTaskParamsSchema, type RemoveTaskArgs } from './remove_task_params.js';
import { logger } from '../utils/logger.js';
import { MiseTaskService } from '../services/MiseTaskService.js';
import { jsonResult, mutationErrorResult, type ToolResult } from './tool_result.js';

export const removeTaskTool = (server: McpServer): void => {
  const processRequest = async (args: RemoveTaskArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Removing ${args.task_name} from ${args.project_path}`);
    try {
      const result = await new MiseTaskService().removeTask(args.project_path, args.task_name);
      if (result.affected_dependents.length > 0) {
        logger.warn(
          `[${TOOL_NAME}] ${result.affected_dependents.length} relation(s) still reference ${result.task_name}`
        );
      }
      return jsonResult(result);
    } catch (error: unknown) {
      return mutationErrorResult(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, RemoveTaskParamsSchema.shape, processRequest);
};
