/**
 * @fileoverview Centralized defaults for the plan store, monitor and renderer.
 *
 * @module config/plan-defaults
 */

// ============================================================================
// Storage
// ============================================================================

/**
 * Plan file name, resolved against the working directory.
 */
export const DEFAULT_PLAN_FILE = '.research_plan.json';

/**
 * Environment variable naming the plan file.
 * Also passed to worker processes started by `planwatch run`.
 */
export const PLAN_FILE_ENV = 'PLANWATCH_FILE';

// ============================================================================
// Monitor
// ============================================================================

/**
 * Default time between polls of the plan file (2 seconds).
 */
export const DEFAULT_POLL_INTERVAL_MS = 2000;

/**
 * Lower bound for the poll interval. Anything tighter just burns CPU.
 */
export const MIN_POLL_INTERVAL_MS = 50;

/**
 * Environment variable overriding the poll interval in milliseconds.
 */
export const POLL_INTERVAL_ENV = 'PLANWATCH_POLL_MS';

// ============================================================================
// Rendering
// ============================================================================

/** Longest item description shown before truncation. */
export const MAX_CONTENT_LENGTH = 70;

/** Width of the `=` rule closing each frame. */
export const RULE_WIDTH = 60;
