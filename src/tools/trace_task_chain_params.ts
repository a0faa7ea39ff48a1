// src/tools/trace_task_chain_params.ts
import { z } from 'zod';
import { ProjectPathSchema } from './analyze_project_for_tasks_params.js';

export const TOOL_NAME = 'trace_task_chain';

export const TOOL_DESCRIPTION = `
Traces the dependency chain of a single task: its transitive dependencies, the tasks that depend on it,
a deterministic execution order, and the layers of tasks that can run in parallel.
Fails with TaskNotFound for an unknown task and CycleDetected when the chain contains a circular dependency.
`;

export const TraceTaskChainParamsSchema = z.object({
  project_path: ProjectPathSchema,
  task_name: z
    .string()
    .min(1, 'task_name cannot be empty.')
    .describe('Required. Full name (e.g. "build:web"), declared name or alias of the task to trace.'),
});

export type TraceTaskChainArgs = z.infer<typeof TraceTaskChainParamsSchema>;
