// src/tools/trace_task_chain_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  TOOL_NAME,
  TOOL_DESCRIPTION,
  TraceTaskChainParamsSchema,
  type TraceTaskChainArgs,
} from './trace_task_chain_params.js';
import { logger } from '../utils/logger.js';
import { MiseTaskService } from '../services/MiseTaskService.js';
import { analysisErrorResult, jsonResult, type ToolResult } from './tool_result.js';

export const traceTaskChainTool = (server: McpServer): void => {
  const processRequest = async (args: TraceTaskChainArgs): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Tracing ${args.task_name} in ${args.project_path}`);
    try {
      const chain = await new MiseTaskService().traceTaskChain(args.project_path, args.task_name);
      logger.info(
        `[${TOOL_NAME}] ${chain.task_name}: ${chain.execution_order.length} task(s) in ${chain.parallel_groups.length} layer(s)`
      );
      return jsonResult(chain);
    } catch (error: unknown) {
      return analysisErrorResult(TOOL_NAME, error);
    }
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, TraceTaskChainParamsSchema.shape, processRequest);
};
