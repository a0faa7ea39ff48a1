// src/tools/validate_task_architecture_params.ts
import { z } from 'zod';
import { ProjectPathSchema } from './analyze_project_for_tasks_params.js';

export const TOOL_NAME = 'validate_task_architecture';

export const TOOL_DESCRIPTION = `
Validates the project's task architecture without changing anything: circular and dangling dependencies,
domain prefixes, orphaned tasks, naming and missing descriptions. Returns task counts, the domains in use,
the issues found (each with a category, severity and task) and improvement suggestions.
`;

export const ValidateTaskArchitectureParamsSchema = z.object({
  project_path: ProjectPathSchema,
});

export type ValidateTaskArchitectureArgs = z.infer<typeof ValidateTaskArchitectureParamsSchema>;
