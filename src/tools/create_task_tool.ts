// src/tools/create_task_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { TOOL_NAME, TOOL_DESCRIPTION, CreateTaskParamsSchema, type CreateTaskArgs } from './create_task_params.js';
import { logger } from '../utils/logger.js';
import { MiseTaskService } from '../services/MiseTaskService.js';
import { jsonResult, mutationErrorResult, type ToolResult } from './tool_result.js';

export const createTaskTool = (server: McpServer): void => {
  const processRequest = async (args: CreateTaskArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Received request for ${args.project_path}: ${args.task_description}`);
    try {
      const result = await new MiseTaskService().createTask({
        project_path: args.project_path,
        description: args.task_description,
        suggested_name: args.suggested_name,
        force_complexity: args.force_complexity,
        domain_hint: args.domain,
        run: args.run,
        depends: args.depends,
        dry_run: args.dry_run,
      });
      logger.info(
        `[${TOOL_NAME}] ${result.dry_run ? 'Planned' : 'Created'} ${result.task_name} (${result.complexity}, ${result.storage})`
      );
      return jsonResult(result);
    } catch (error: unknown) {
      return mutationErrorResult(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, CreateTaskParamsSchema.shape, processRequest);
};
