/**
 * @fileoverview Runtime configuration for planwatch
 *
 * Resolves the plan file path and poll interval from, in order of
 * precedence: explicit overrides (CLI flags), environment variables,
 * built-in defaults.
 *
 * @module plan-config
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_PLAN_FILE,
  DEFAULT_POLL_INTERVAL_MS,
  MIN_POLL_INTERVAL_MS,
  PLAN_FILE_ENV,
  POLL_INTERVAL_ENV,
} from './config/plan-defaults.js';
import { formatIssues } from './schemas.js';

export interface PlanConfig {
  /** Absolute path of the plan file */
  filePath: string;
  /** Time between monitor polls */
  pollIntervalMs: number;
}

export interface PlanConfigOverrides {
  filePath?: string;
  pollIntervalMs?: string | number;
}

const PlanConfigSchema = z.object({
  filePath: z.string().min(1),
  pollIntervalMs: z.coerce
    .number()
    .int('poll interval must be a whole number of milliseconds')
    .min(MIN_POLL_INTERVAL_MS, `poll interval must be at least ${MIN_POLL_INTERVAL_MS}ms`),
});

/**
 * Resolves configuration.
 *
 * @param overrides - Values from the command line; undefined entries are ignored
 * @param env - Environment to read (defaults to process.env)
 * @param cwd - Base directory for relative paths
 * @throws Error when a value is invalid
 */
export function resolvePlanConfig(
  overrides: PlanConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): PlanConfig {
  const raw = {
    filePath: overrides.filePath ?? env[PLAN_FILE_ENV] ?? DEFAULT_PLAN_FILE,
    pollIntervalMs: overrides.pollIntervalMs ?? env[POLL_INTERVAL_ENV] ?? DEFAULT_POLL_INTERVAL_MS,
  };

  const parsed = PlanConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error).join('; ')}`);
  }

  return {
    filePath: resolve(cwd, parsed.data.filePath),
    pollIntervalMs: parsed.data.pollIntervalMs,
  };
}
