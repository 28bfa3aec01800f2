/**
 * Request schemas for the dev server API.
 */
import { z } from 'zod';
import { parameterSchema } from '../discovery.js';
import type { JsonValue } from '../types.js';

const jsonValue = z.custom<JsonValue>((v) => v !== undefined);

export const executeTaskSchema = z.object({
  runID: z.string().min(1).optional(),
  slug: z.string().min(1, 'slug is required'),
  paramValues: z.record(z.string(), jsonValue).default({}),
  /** alias -> resource slug */
  resources: z.record(z.string(), z.string()).default({}),
});
export type ExecuteTaskInput = z.infer<typeof executeTaskSchema>;

export const idQuerySchema = z.object({
  id: z.string().min(1, 'id is required'),
});

export const listRunsQuerySchema = z.object({
  taskSlug: z.string().min(1, 'taskSlug is required'),
});

export const runIDQuerySchema = z.object({
  runID: z.string().min(1, 'runID is required'),
});

export const cancelRunSchema = z.object({
  runID: z.string().min(1, 'runID is required'),
});

export const createRunSchema = z
  .object({
    taskSlug: z.string().min(1).optional(),
  })
  .default({});

export const logsParamsSchema = z.object({
  runID: z.string().min(1),
});

export const viewEnvQuerySchema = z.object({
  slug: z.string().min(1, 'slug is required'),
});

export const createDisplaySchema = z.object({
  display: z.object({
    kind: z.enum(['markdown', 'table', 'json']),
    content: z.string().default(''),
    rows: z.array(jsonValue).default([]),
    columns: z.array(z.object({ name: z.string(), slug: z.string() })).default([]),
    value: jsonValue.optional(),
  }),
});
export type CreateDisplayInput = z.infer<typeof createDisplaySchema>;

export const createPromptSchema = z.object({
  schema: z.array(parameterSchema).default([]),
  values: z.record(z.string(), jsonValue).default({}),
  reviewers: z
    .object({
      groups: z.array(z.string()).default([]),
      users: z.array(z.string()).default([]),
      allowSelfApprovals: z.boolean().default(true),
    })
    .default({}),
  confirmText: z.string().default(''),
  cancelText: z.string().default(''),
  description: z.string().default(''),
});
export type CreatePromptInput = z.infer<typeof createPromptSchema>;

export const submitPromptSchema = z.object({
  id: z.string().min(1, 'prompt ID is required'),
  runID: z.string().min(1, 'run ID is required'),
  values: z.record(z.string(), jsonValue).default({}),
});

export const createSleepSchema = z.object({
  durationMs: z.number().int().nonnegative(),
  until: z.string().datetime({ offset: true }),
});

export const skipSleepSchema = z.object({
  sleepID: z.string().min(1, 'sleepID is required'),
  runID: z.string().min(1, 'runID is required'),
});
