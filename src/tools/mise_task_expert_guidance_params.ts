// src/tools/mise_task_expert_guidance_params.ts
import { z } from 'zod';

export const TOOL_NAME = 'mise_task_expert_guidance';

export const TOOL_DESCRIPTION =
  'Returns expert tips for tuning and debugging mise tasks, common task problems with their fixes, and strategies for migrating from npm scripts, make or just.';

export const MiseTaskExpertGuidanceParamsSchema = z.object({});

export type MiseTaskExpertGuidanceArgs = z.infer<typeof MiseTaskExpertGuidanceParamsSchema>;
