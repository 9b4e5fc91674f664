/**
 * @fileoverview Runtime schemas for plan documents and update deltas.
 *
 * @module schemas
 */

import { z } from 'zod';
import { TODO_STATUSES } from './types.js';

export const TodoStatusSchema = z.enum(TODO_STATUSES);

export const TodoItemSchema = z.object({
  id: z.string().min(1),
  status: TodoStatusSchema,
  content: z.string(),
});

/**
 * Delta as supplied by a producer. `null` fields are treated as absent,
 * since tool-calling models often send explicit nulls for fields they skip.
 */
export const TodoDeltaSchema = z.object({
  id: z.string().refine((id) => id.trim().length > 0, 'id must be a non-empty string'),
  status: TodoStatusSchema.nullish().transform((v) => v ?? undefined),
  content: z.string().nullish().transform((v) => v ?? undefined),
});

export const PlanDocumentSchema = z
  .object({
    explanation: z.string(),
    updated_at: z.string(),
    todos: z.array(TodoItemSchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    for (const todo of doc.todos) {
      if (seen.has(todo.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate id "${todo.id}"`, path: ['todos'] });
      }
      seen.add(todo.id);
    }
  });

/** Arguments of the `update_research_plan` tool call. */
export const UpdatePlanArgsSchema = z.object({
  todos: z.array(z.unknown()).min(1, 'list is empty. You must provide at least one TODO item.'),
  explanation: z
    .string()
    .nullish()
    .transform((v) => v ?? ''),
});

export type UpdatePlanArgs = z.infer<typeof UpdatePlanArgsSchema>;

/**
 * Flattens zod issues into `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
