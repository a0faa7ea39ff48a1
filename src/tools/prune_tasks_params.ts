// src/tools/prune_tasks_params.ts
import { z } from 'zod';
import { ProjectPathSchema } from './analyze_project_for_tasks_params.js';

export const TOOL_NAME = 'prune_tasks';

export const TOOL_DESCRIPTION = `
Finds tasks that look redundant: isolated tasks that track nothing, tasks repeating another task's command
in the same domain, and tasks superseded by another task with the same effective command.
With dry_run (the default) only the candidates and reasons are returned. Otherwise the candidates are removed
and every task still referencing a removed one is listed.
`;

export const PruneTasksParamsSchema = z.object({
  project_path: ProjectPathSchema,
  dry_run: z
    .boolean()
    .optional()
    .default(true)
    .describe('Optional. Report candidates without removing them. Defaults to true.'),
});

export type PruneTasksArgs = z.infer<typeof PruneTasksParamsSchema>;
