/**
 * @fileoverview Tests for the update_research_plan tool adapter
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { PlanStore, resetStoreInstance } from '../src/plan-store.js';
import {
  PLAN_TOOL_DESCRIPTION,
  PLAN_TOOL_NAME,
  completedWork,
  formatMergeSummary,
  updateResearchPlan,
} from '../src/plan-tool.js';
import { createTestDir, makePlan, removeTestDir } from './helpers.js';

describe('tool definition', () => {
  it('should describe every status to the agent', () => {
    expect(PLAN_TOOL_NAME).toBe('update_research_plan');
    for (const status of ['pending', 'in_progress', 'completed']) {
      expect(PLAN_TOOL_DESCRIPTION).toContain(`'${status}'`);
    }
  });
});

describe('formatMergeSummary', () => {
  it('should list only non-zero statuses in display order', () => {
    const doc = makePlan(
      [
        { id: 'a', status: 'completed', content: 'A' },
        { id: 'b', status: 'pending', content: 'B' },
        { id: 'c', status: 'in_progress', content: 'C' },
        { id: 'd', status: 'pending', content: 'D' },
      ],
      'Starting step c',
    );

    expect(formatMergeSummary(doc)).toBe(
      'Research plan updated successfully. Starting step c\nTotal TODOs: 4 (1 in_progress, 2 pending, 1 completed)',
    );
  });

  it('should drop the explanation when it is empty', () => {
    const doc = makePlan([{ id: 'a', status: 'pending', content: 'A' }], '');

    expect(formatMergeSummary(doc)).toBe('Research plan updated successfully.\nTotal TODOs: 1 (1 pending)');
  });
});

describe('updateResearchPlan', () => {
  let testDir: string;
  let store: PlanStore;

  beforeEach(() => {
    testDir = createTestDir();
    store = new PlanStore(join(testDir, '.research_plan.json'));
  });

  afterEach(() => {
    removeTestDir(testDir);
  });

  it('should create the plan and summarize it', async () => {
    const result = await updateResearchPlan(
      {
        todos: [
          { id: 'step-1', status: 'pending', content: 'Research company background' },
          { id: 'step-2', status: 'pending', content: 'Identify key products' },
        ],
        explanation: 'Creating initial plan',
      },
      store,
    );

    expect(result).toBe('Research plan updated successfully. Creating initial plan\nTotal TODOs: 2 (2 pending)');
  });

  it('should merge status-only updates', async () => {
    await updateResearchPlan({ todos: [{ id: 'step-1', content: 'Research X' }, { id: 'step-2', content: 'Y' }] }, store);

    const result = await updateResearchPlan(
      { todos: [{ id: 'step-1', status: 'in_progress' }], explanation: 'Starting step 1' },
      store,
    );

    expect(result).toBe('Research plan updated successfully. Starting step 1\nTotal TODOs: 2 (1 in_progress, 1 pending)');
    const doc = await store.read();
    expect(doc?.todos[0]).toEqual({ id: 'step-1', status: 'in_progress', content: 'Research X' });
  });

  it('should accept a null explanation', async () => {
    const result = await updateResearchPlan({ todos: [{ id: 'step-1', content: 'Research X' }], explanation: null }, store);

    expect(result).toBe('Research plan updated successfully.\nTotal TODOs: 1 (1 pending)');
    expect((await store.read())?.explanation).toBe('');
  });

  it('should refuse an empty todos list', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = await updateResearchPlan({ todos: [] }, store);

    expect(result).toBe(
      'Cannot update research plan: todos: list is empty. You must provide at least one TODO item.',
    );
    expect(errorSpy).toHaveBeenCalledWith(`[PlanTool] ${result}`);
    expect(await store.read()).toBeNull();
  });

  it('should refuse arguments that are not an object', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await updateResearchPlan('step-1 done', store)).toBe(
      'Cannot update research plan: Expected object, received string',
    );
  });

  it('should report a rejected batch as text', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await updateResearchPlan({ todos: [{ id: 'step-1', content: 'Research X' }] }, store);

    const result = await updateResearchPlan({ todos: [{ id: 'step-1', status: 'blocked' }] }, store);

    expect(result).toMatch(/^Cannot update research plan: Invalid plan update: todos\[0\]\.status: /);
    const doc = await store.read();
    expect(doc?.todos[0].status).toBe('pending');
  });

  describe('default store', () => {
    afterEach(() => {
      resetStoreInstance();
      vi.unstubAllEnvs();
    });

    it('should write to $PLANWATCH_FILE when no store is given', async () => {
      const filePath = join(testDir, 'from-env.json');
      vi.stubEnv('PLANWATCH_FILE', filePath);
      resetStoreInstance();

      await updateResearchPlan({ todos: [{ id: 'step-1', content: 'Research X' }] });

      expect(await new PlanStore(filePath).read()).toMatchObject({
        todos: [{ id: 'step-1', status: 'pending', content: 'Research X' }],
      });
    });
  });
});

describe('completedWork', () => {
  it('should return completed items in plan order', () => {
    const doc = makePlan([
      { id: 'a', status: 'completed', content: 'A' },
      { id: 'b', status: 'in_progress', content: 'B' },
      { id: 'c', status: 'completed', content: 'C' },
    ]);

    expect(completedWork(doc).map((t) => t.id)).toEqual(['a', 'c']);
  });

  it('should return nothing when no plan was written', () => {
    expect(completedWork(null)).toEqual([]);
  });
});
