// src/tools/create_task_params.ts
import { z } from 'zod';
import { ProjectPathSchema } from './analyze_project_for_tasks_params.js';

export const TOOL_NAME = 'create_task';

export const TOOL_DESCRIPTION = `
Creates a new mise task from a description. The domain is inferred from the description unless a domain is given;
complexity decides the storage: simple and moderate tasks go inline into mise.toml, complex tasks into a script
under the task directory. Set dry_run to get the placement plan without writing anything.
Fails with InvalidDomain, InvalidComplexity, NameCollision or DanglingDependency.
`;

export const CreateTaskParamsSchema = z.object({
  project_path: ProjectPathSchema,
  task_description: z
    .string()
    .min(1, 'task_description cannot be empty.')
    .describe('Required. What the task should do, e.g. "deploy to production" or "npm run build".'),
  suggested_name: z
    .string()
    .min(1)
    .optional()
    .describe('Optional. Task name, with or without a domain prefix (e.g. "web" or "build:web").'),
  force_complexity: z
    .string()
    .optional()
    .describe('Optional. One of "simple", "moderate" or "complex"; overrides the inferred complexity.'),
  domain: z
    .string()
    .optional()
    .describe('Optional. One of build, test, lint, dev, deploy, db, ci, docs, clean, setup; overrides the inferred domain.'),
  run: z
    .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
    .optional()
    .describe('Optional. Command or commands to run; derived from the description or the project when omitted.'),
  depends: z
    .array(z.string().min(1))
    .optional()
    .describe('Optional. Tasks that must complete first. Every entry must name an existing task.'),
  dry_run: z.boolean().optional().default(false).describe('Optional. Plan only; write nothing. Defaults to false.'),
});

export type CreateTaskArgs = z.infer<typeof CreateTaskParamsSchema>;
