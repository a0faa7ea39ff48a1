// src/tools/analyze_project_for_tasks_params.ts
import { z } from 'zod';

export const TOOL_NAME = 'analyze_project_for_tasks';

export const TOOL_DESCRIPTION = `
Analyzes a project's structure and its existing mise tasks (inline in mise.toml and file-backed under the task directories).
Returns the detected package managers, languages and frameworks, the extracted tasks, any malformed entries that were skipped,
and recommendations for tasks the project is missing, each with a priority, effort estimate and needed dependencies.
`;

export const ProjectPathSchema = z
  .string()
  .min(1, 'project_path cannot be empty.')
  .describe('Required. Path to the project root directory.');

export const AnalyzeProjectParamsSchema = z.object({
  project_path: ProjectPathSchema,
});

export type AnalyzeProjectArgs = z.infer<typeof AnalyzeProjectParamsSchema>;
