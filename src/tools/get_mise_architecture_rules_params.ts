// src/tools/get_mise_architecture_rules_params.ts
import { z } from 'zod';

export const TOOL_NAME = 'get_mise_architecture_rules';

export const TOOL_DESCRIPTION =
  'Returns the task architecture rules applied by the other tools: domains, complexity levels and where each is stored, dependency kinds and dependency patterns.';

export const GetMiseArchitectureRulesParamsSchema = z.object({});

export type GetMiseArchitectureRulesArgs = z.infer<typeof GetMiseArchitectureRulesParamsSchema>;
