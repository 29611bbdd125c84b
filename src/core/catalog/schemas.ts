/**
 * Zod Schemas for Catalog Content
 *
 * Shared by the task-file loader and the HTTP API so that a task accepted by
 * one is accepted by the other.
 */

import { z } from 'zod';

export const hintSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
});

/**
 * Exercise payload. Unknown keys are kept (and hashed).
 */
export const exercisePayloadSchema = z
  .object({
    q: z.string().min(1, 'Question must not be empty'),
    a: z.string().min(1, 'Answer key must not be empty'),
    base: z.string().optional(),
    info: z.array(z.string()).optional(),
    hints: z.array(hintSchema).optional(),
    choices: z.array(z.string()).optional(),
  })
  .passthrough();

export const filterTagsSchema = z.record(z.string().min(1), z.string());

/**
 * A task as it appears inside a task file: tags plus payload fields.
 */
export const taskFileEntrySchema = exercisePayloadSchema.extend({
  tags: filterTagsSchema.optional(),
});

/**
 * A task file: `{ theme, category, tasks: [...] }`.
 */
export const taskFileSchema = z.object({
  theme: z.string().min(1),
  category: z.string().min(1),
  tasks: z.array(taskFileEntrySchema),
});

export type TaskFile = z.infer<typeof taskFileSchema>;
export type TaskFileEntry = z.infer<typeof taskFileEntrySchema>;
