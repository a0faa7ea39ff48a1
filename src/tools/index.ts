import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from '../utils/index.js';

import { analyzeProjectForTasksTool } from './analyze_project_for_tasks_tool.js';
import { traceTaskChainTool } from './trace_task_chain_tool.js';
import { validateTaskArchitectureTool } from './validate_task_architecture_tool.js';
import { createTaskTool } from './create_task_tool.js';
import { removeTaskTool } from './remove_task_tool.js';
import { pruneTasksTool } from './prune_tasks_tool.js';
import { getTaskRecommendationsTool } from './get_task_recommendations_tool.js';
import { getMiseArchitectureRulesTool } from './get_mise_architecture_rules_tool.js';
import { miseTaskExpertGuidanceTool } from './mise_task_expert_guidance_tool.js';
import { taskChainAnalystTool } from './task_chain_analyst_tool.js';

/**
 * Register all defined tools with the MCP server instance.
 */
export function registerTools(server: McpServer): void {
  logger.info('Registering tools...');

  try {
    analyzeProjectForTasksTool(server);
    traceTaskChainTool(server);
    validateTaskArchitectureTool(server);
    createTaskTool(server);
    removeTaskTool(server);
    pruneTasksTool(server);
    getTaskRecommendationsTool(server);
    getMiseArchitectureRulesTool(server);
    miseTaskExpertGuidanceTool(server);
    taskChainAnalystTool(server);

    logger.info('All tools registered successfully.');
  } catch (error: unknown) {
    logger.error({ err: error }, 'Failed during tool registration');
    throw new Error(`Failed to register tools: ${error instanceof Error ? error.message : String(error)}`);
  }
}
