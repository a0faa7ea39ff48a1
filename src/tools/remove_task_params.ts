// src/tools/remove_task_params.ts
import { z } from 'zod';
import { ProjectPathSchema } from './analyze_project_for_tasks_params.js';

export const TOOL_NAME = 'remove_task';

export const TOOL_DESCRIPTION = `
Removes a task: its entry in mise.toml, or its script file. Tasks that still reference it are NOT edited;
they are returned as affected_dependents so their dependency lists can be fixed afterwards.
`;

export const RemoveTaskParamsSchema = z.object({
  project_path: ProjectPathSchema,
  task_name: z
    .string()
    .min(1, 'task_name cannot be empty.')
    .describe('Required. Full name, declared name or alias of the task to remove.'),
});

export type RemoveTaskArgs = z.infer<typeof RemoveTaskParamsSchema>;
