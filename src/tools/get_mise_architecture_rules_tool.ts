// src/tools/get_mise_architecture_rules_tool.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  TOOL_NAME,
  TOOL_DESCRIPTION,
  GetMiseArchitectureRulesParamsSchema,
} from './get_mise_architecture_rules_params.js';
import { logger } from '../utils/logger.js';
import { ConfigurationManager } from '../config/ConfigurationManager.js';
import { TASK_DOMAINS } from '../types/index.js';
import { jsonResult, type ToolResult } from './tool_result.js';
import guidance from '../data/task-guidance.json';

export const getMiseArchitectureRulesTool = (server: McpServer): void => {
  const processRequest = async (): Promise<ToolResult> => {
    logger.info(`[${TOOL_NAME}] Serving architecture rules`);
    const settings = ConfigurationManager.getInstance().getSettings();
    return jsonResult({
      domains: TASK_DOMAINS,
      complexity_thresholds: settings.complexity,
      task_directories: settings.taskDirectories,
      ...guidance.architecture_rules,
    });
  };

  server.tool(TOOL_NAME, TOOL_DESCRIPTION, GetMiseArchitectureRulesParamsSchema.shape, processRequest);
};
