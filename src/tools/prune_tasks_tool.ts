// src/tools/prune_tasks_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, PruneTasksParamsSchema, type PruneTasksArgs } from './prune_tasks_params.js';
import { logger } from '../utils/logger.js';
import { MiseTaskService } from '../services/MiseTaskService.js';
import { jsonResult, mutationErrorResult, type ToolResult } from './tool_result.js';

export const pruneTasksTool = (server: McpServer): void => {
  const processRequest = async (args: PruneTasksArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request for ${args.project_path} (dry_run=${args.dry_run})`);
    try {
      const result = await new MiseTaskService().pruneTasks(args.project_path, args.dry_run);
      logger.info(
        `[${TOOL_NAME}] ${result.candidates.length} candidate(s), ${result.removed.length} removed`
      );
      return jsonResult(result);
    } catch (error: unknown) {
      return mutationErrorResult(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, PruneTasksParamsSchema.shape, processRequest);
};
