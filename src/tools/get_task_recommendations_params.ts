// src/tools/get_task_recommendations_params.ts
import { z } from 'zod';

export const TOOL_NAME = 'get_task_recommendations';

export const TOOL_DESCRIPTION =
  'Returns best practices for naming, organizing and wiring mise tasks, common task patterns and per-domain guidelines.';

export const GetTaskRecommendationsParamsSchema = z.object({});

export type GetTaskRecommendationsArgs = z.infer<typeof GetTaskRecommendationsParamsSchema>;
