/**
 * @fileoverview Merge engine for plan documents.
 *
 * Pure functions that turn (current document, update batch) into the next
 * document. All validation happens before anything is applied, so a batch
 * is either merged completely or rejected with a ValidationError.
 *
 * Merge rules:
 * - Existing items are updated in place by id; omitted fields keep their value
 * - Unknown ids are appended in the order they first appear in the batch
 * - New items need `content`; status defaults to `pending`
 * - Duplicate ids inside one batch must be identical, otherwise the batch is rejected
 *
 * @module plan-merge
 */

import { ValidationError } from './errors.js';
import { TodoDeltaSchema, formatIssues } from './schemas.js';
import type { PlanDocument, StatusCounts, TodoDelta, TodoItem, TodoStatus } from './types.js';

/** Returns a plan with no items and no explanation. */
export function createEmptyPlan(): PlanDocument {
  return { explanation: '', updated_at: '', todos: [] };
}

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function sameDelta(a: TodoDelta, b: TodoDelta): boolean {
  return a.status === b.status && a.content === b.content;
}

/**
 * Validates a raw update batch against the current document.
 *
 * @param batch - Untrusted batch, usually straight from a tool call
 * @param current - Current document, or null when none exists yet
 * @returns Deduplicated deltas in first-appearance order
 * @throws ValidationError listing every problem found
 */
export function validateBatch(batch: unknown, current: PlanDocument | null): TodoDelta[] {
  if (!Array.isArray(batch)) {
    throw new ValidationError(['todos must be an array']);
  }
  if (batch.length === 0) {
    throw new ValidationError(['todos list is empty. You must provide at least one TODO item.']);
  }

  const issues: string[] = [];
  const byId = new Map<string, TodoDelta>();
  const existingIds = new Set((current?.todos ?? []).map((t) => t.id));

  batch.forEach((raw, index) => {
    const parsed = TodoDeltaSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of formatIssues(parsed.error)) {
        issues.push(`todos[${index}].${issue}`);
      }
      return;
    }

    const delta = parsed.data;
    const previous = byId.get(delta.id);
    if (previous) {
      if (!sameDelta(previous, delta)) {
        issues.push(`todos[${index}]: conflicting duplicate update for id "${delta.id}"`);
      }
      return;
    }
    byId.set(delta.id, delta);

    if (!existingIds.has(delta.id) && delta.content === undefined) {
      issues.push(`todos[${index}]: new item "${delta.id}" requires content`);
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return Array.from(byId.values());
}

/**
 * Applies an update batch and returns the next document.
 * Inputs are never mutated.
 *
 * @param current - Current document, or null to start from an empty plan
 * @param batch - Update deltas (validated here)
 * @param explanation - Replaces the document's explanation
 * @param now - Merge time, defaults to the current time
 * @throws ValidationError when the batch is rejected
 */
export function mergePlan(
  current: PlanDocument | null,
  batch: unknown,
  explanation: string,
  now: Date = new Date(),
): PlanDocument {
  const deltas = validateBatch(batch, current);

  const todos: TodoItem[] = (current?.todos ?? []).map((t) => ({ ...t }));
  const indexById = new Map(todos.map((t, i) => [t.id, i]));

  for (const delta of deltas) {
    const index = indexById.get(delta.id);
    if (index !== undefined) {
      const existing = todos[index];
      todos[index] = {
        id: existing.id,
        status: delta.status ?? existing.status,
        content: delta.content ?? existing.content,
      };
    } else {
      indexById.set(delta.id, todos.length);
      todos.push({
        id: delta.id,
        status: delta.status ?? 'pending',
        content: delta.content ?? '',
      });
    }
  }

  return {
    explanation,
    updated_at: formatTimestamp(now),
    todos,
  };
}

/**
 * Counts items per status. Every status is present, zero when unused.
 */
export function countByStatus(todos: readonly TodoItem[]): StatusCounts {
  const counts: StatusCounts = { in_progress: 0, pending: 0, completed: 0 };
  for (const todo of todos) {
    counts[todo.status] += 1;
  }
  return counts;
}

/** Items with the given status, in plan order. */
export function filterByStatus(todos: readonly TodoItem[], status: TodoStatus): TodoItem[] {
  return todos.filter((t) => t.status === status);
}
