/**
 * @fileoverview `update_research_plan` tool for research agents.
 *
 * Adapts untrusted tool-call arguments from a language model to
 * PlanStore.merge() and answers with a short text summary the model can
 * read. Failures come back as text too, so the agent can fix its call.
 *
 * @module plan-tool
 */

import { countByStatus, filterByStatus } from './plan-merge.js';
import { getStore, type PlanStore } from './plan-store.js';
import { UpdatePlanArgsSchema, formatIssues } from './schemas.js';
import { TODO_STATUSES, getErrorMessage, type PlanDocument, type TodoItem } from './types.js';

export const PLAN_TOOL_NAME = 'update_research_plan';

export const PLAN_TOOL_DESCRIPTION = `Create and manage a structured TODO list for research sessions.

The list is persisted to a JSON file. When updating existing TODOs, only provide
the fields you want to change - they are merged with the existing data.

Each TODO item has:
- 'id': unique identifier (e.g., 'step-1', 'step-2')
- 'status': one of 'pending', 'in_progress', 'completed'
- 'content': description of the task (required when the item is first created)

Usage:
- Create initial plan: pass all items with status 'pending'
- Mark item in progress: pass {"id": "step-1", "status": "in_progress"}
- Complete item: pass {"id": "step-1", "status": "completed"}`;

/**
 * Builds the summary returned to the agent after a successful update.
 *
 * @example
 * ```
 * Research plan updated successfully. Completed step 1
 * Total TODOs: 2 (1 pending, 1 completed)
 * ```
 */
export function formatMergeSummary(doc: PlanDocument): string {
  const counts = countByStatus(doc.todos);
  const parts = TODO_STATUSES.filter((s) => counts[s] > 0).map((s) => `${counts[s]} ${s}`);
  const head = doc.explanation
    ? `Research plan updated successfully. ${doc.explanation}`
    : 'Research plan updated successfully.';
  return `${head}\nTotal TODOs: ${doc.todos.length} (${parts.join(', ')})`;
}

/**
 * Tool entry point.
 *
 * @param args - Raw arguments: `{ todos: [...], explanation?: string }`
 * @param store - Store to merge into (default: the process-wide store)
 * @returns Summary text, or an error message starting with `Cannot update research plan:`
 */
export async function updateResearchPlan(args: unknown, store: PlanStore = getStore()): Promise<string> {
  const parsed = UpdatePlanArgsSchema.safeParse(args);
  if (!parsed.success) {
    const message = `Cannot update research plan: ${formatIssues(parsed.error).join('; ')}`;
    console.error(`[PlanTool] ${message}`);
    return message;
  }

  try {
    const doc = await store.merge(parsed.data.todos, parsed.data.explanation);
    return formatMergeSummary(doc);
  } catch (err) {
    const message = `Cannot update research plan: ${getErrorMessage(err)}`;
    console.error(`[PlanTool] ${message}`);
    return message;
  }
}

/** Items the report writer can list as done. */
export function completedWork(doc: PlanDocument | null): TodoItem[] {
  return doc ? filterByStatus(doc.todos, 'completed') : [];
}
