// src/tools/task_chain_analyst_params.ts
import { z } from 'zod';

export const TOOL_NAME = 'task_chain_analyst';

export const TOOL_DESCRIPTION =
  'Returns techniques for analyzing task execution chains (critical path, parallel layers, bottlenecks), strategies for shortening them and the metrics worth tracking. Use trace_task_chain for the layers of a specific task.';

export const TaskChainAnalystParamsSchema = z.object({});

export type TaskChainAnalystArgs = z.infer<typeof TaskChainAnalystParamsSchema>;
