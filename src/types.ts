/**
 * @fileoverview Type definitions for planwatch
 *
 * This module contains the TypeScript types shared across the store,
 * merge engine, monitor and renderer:
 * - Plan document and TODO items
 * - Partial update deltas
 * - Status counts
 * - Error helpers
 */

// ========== Status Types ==========

/** Every status a TODO item may hold, in display order. */
export const TODO_STATUSES = ['in_progress', 'pending', 'completed'] as const;

/** Status of a TODO item in the plan */
export type TodoStatus = (typeof TODO_STATUSES)[number];

/** Type guard for values read from untrusted input. */
export function isTodoStatus(value: unknown): value is TodoStatus {
  return TODO_STATUSES.some((status) => status === value);
}

// ========== Plan Types ==========

/**
 * One unit of planned work.
 */
export interface TodoItem {
  /** Stable identity assigned by the producer (e.g. "step-1") */
  id: string;
  /** Current status */
  status: TodoStatus;
  /** Description of the work */
  content: string;
}

/**
 * Partial update for a TODO item. Omitted fields keep their current value.
 * A delta for an unknown id creates the item and must carry `content`.
 */
export interface TodoDelta {
  id: string;
  status?: TodoStatus;
  content?: string;
}

/**
 * The persisted plan snapshot.
 * Field names match the on-disk JSON layout.
 */
export interface PlanDocument {
  /** Description of the most recent change, replaced on every merge */
  explanation: string;
  /** Local time of the most recent merge, `YYYY-MM-DD HH:MM:SS` */
  updated_at: string;
  /** Items in creation order */
  todos: TodoItem[];
}

/** Number of items per status, zero-filled. */
export type StatusCounts = Record<TodoStatus, number>;

/**
 * Anything the monitor can poll for the current plan.
 * `null` means no plan has been written yet.
 */
export interface PlanSource {
  read(): Promise<PlanDocument | null>;
}

/** Minimal text sink used by the renderer (process.stdout satisfies it). */
export interface TextSink {
  write(chunk: string): unknown;
}

// ========== Error Helpers ==========

/**
 * Type guard to check if a value is an Error instance.
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Safely extracts an error message from an unknown caught value.
 *
 * @example
 * ```typescript
 * try {
 *   await store.merge(batch);
 * } catch (err) {
 *   console.error('Failed:', getErrorMessage(err));
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}
