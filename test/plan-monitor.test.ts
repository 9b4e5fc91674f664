/**
 * @fileoverview Tests for PlanMonitor
 *
 * Tests change detection, tolerance of missing and failing reads,
 * and the start/stop lifecycle of the poll loop.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { PlanMonitor, documentKey } from '../src/plan-monitor.js';
import { PlanStore } from '../src/plan-store.js';
import type { PlanDocument } from '../src/types.js';
import { FakeSource, RecordingRenderer, createTestDir, makePlan, removeTestDir } from './helpers.js';

const PLAN_A = makePlan([{ id: 'step-1', status: 'pending', content: 'Research X' }], 'Creating plan');
const PLAN_B = makePlan([{ id: 'step-1', status: 'in_progress', content: 'Research X' }], 'Starting step 1');

describe('documentKey', () => {
  it('should match for structurally identical documents', () => {
    expect(documentKey(structuredClone(PLAN_A))).toBe(documentKey(PLAN_A));
  });

  it('should differ when any field changes', () => {
    const renamed: PlanDocument = { ...PLAN_A, explanation: 'Something else' };

    expect(documentKey(renamed)).not.toBe(documentKey(PLAN_A));
    expect(documentKey(PLAN_B)).not.toBe(documentKey(PLAN_A));
  });
});

describe('PlanMonitor', () => {
  let source: FakeSource;
  let renderer: RecordingRenderer;
  let monitor: PlanMonitor;

  beforeEach(() => {
    source = new FakeSource();
    renderer = new RecordingRenderer();
    monitor = new PlanMonitor(source, renderer, { pollIntervalMs: 20 });
  });

  afterEach(async () => {
    await monitor.stop();
  });

  describe('poll', () => {
    it('should skip silently when no plan exists yet', async () => {
      const warnSpy = vi.spyOn(console, 'warn');

      expect(await monitor.poll()).toBe(false);
      expect(renderer.frames).toHaveLength(0);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should render the first document it sees', async () => {
      source.doc = PLAN_A;

      expect(await monitor.poll()).toBe(true);
      expect(renderer.frames).toEqual([PLAN_A]);
    });

    it('should not repaint an unchanged document', async () => {
      source.doc = PLAN_A;

      await monitor.poll();
      await monitor.poll();
      await monitor.poll();

      expect(renderer.frames).toHaveLength(1);
      expect(monitor.getRenderCount()).toBe(1);
    });

    it('should render once per distinct consecutive state', async () => {
      const states = [PLAN_A, PLAN_A, PLAN_B, PLAN_B, PLAN_B, PLAN_A];

      for (const state of states) {
        source.doc = state;
        await monitor.poll();
      }

      expect(renderer.frames).toEqual([PLAN_A, PLAN_B, PLAN_A]);
      expect(source.reads).toBe(6);
    });

    it('should emit monitor:render with the document', async () => {
      const handler = vi.fn();
      monitor.on('monitor:render', handler);
      source.doc = PLAN_A;

      await monitor.poll();

      expect(handler).toHaveBeenCalledWith(PLAN_A);
    });

    it('should log a read failure once and keep going', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const errorHandler = vi.fn();
      monitor.on('monitor:error', errorHandler);
      source.error = new Error('disk gone');

      expect(await monitor.poll()).toBe(false);
      expect(await monitor.poll()).toBe(false);

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith('[PlanMonitor] Failed to read plan, retrying next poll: disk gone');
      expect(errorHandler).toHaveBeenCalledTimes(2);

      source.error = null;
      source.doc = PLAN_A;
      expect(await monitor.poll()).toBe(true);
    });

    it('should log the same failure again after a successful read', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      source.error = new Error('disk gone');
      await monitor.poll();

      source.error = null;
      await monitor.poll();
      source.error = new Error('disk gone');
      await monitor.poll();

      expect(warnSpy).toHaveBeenCalledTimes(2);
    });

    it('should retry rendering after the renderer throws', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const render = vi.spyOn(renderer, 'render').mockImplementationOnce(() => {
        throw new Error('EPIPE');
      });
      source.doc = PLAN_A;

      expect(await monitor.poll()).toBe(false);
      expect(await monitor.poll()).toBe(true);
      expect(render).toHaveBeenCalledTimes(2);
    });

    it('should tolerate a plan file that does not exist', async () => {
      const testDir = createTestDir();
      try {
        const warnSpy = vi.spyOn(console, 'warn');
        const fileMonitor = new PlanMonitor(new PlanStore(join(testDir, 'missing.json')), renderer);

        expect(await fileMonitor.poll()).toBe(false);
        expect(warnSpy).not.toHaveBeenCalled();
      } finally {
        removeTestDir(testDir);
      }
    });
  });

  describe('start and stop', () => {
    it('should poll on an interval and render changes', async () => {
      source.doc = PLAN_A;
      monitor.start();
      expect(monitor.isRunning()).toBe(true);

      await vi.waitFor(() => expect(renderer.frames).toHaveLength(1));
      source.doc = PLAN_B;
      await vi.waitFor(() => expect(renderer.frames).toHaveLength(2));
      await vi.waitFor(() => expect(source.reads).toBeGreaterThan(4));

      expect(renderer.frames).toEqual([PLAN_A, PLAN_B]);
    });

    it('should ignore a second start', async () => {
      source.doc = PLAN_A;
      monitor.start();
      monitor.start();

      await vi.waitFor(() => expect(renderer.frames).toHaveLength(1));
      await monitor.stop();

      expect(renderer.frames).toHaveLength(1);
    });

    it('should stop well within one poll interval', async () => {
      const slow = new PlanMonitor(source, renderer, { pollIntervalMs: 60_000 });
      source.doc = PLAN_A;
      slow.start();
      await vi.waitFor(() => expect(renderer.frames).toHaveLength(1));

      const startedAt = Date.now();
      await slow.stop();

      expect(Date.now() - startedAt).toBeLessThan(1000);
      expect(slow.isRunning()).toBe(false);
    });

    it('should paint the final state and settle once on stop', async () => {
      const slow = new PlanMonitor(source, renderer, { pollIntervalMs: 60_000 });
      source.doc = PLAN_A;
      slow.start();
      await vi.waitFor(() => expect(renderer.frames).toHaveLength(1));

      source.doc = PLAN_B;
      await slow.stop();
      await slow.stop();

      expect(renderer.frames).toEqual([PLAN_A, PLAN_B]);
      expect(renderer.settles).toBe(1);
    });

    it('should stop polling after stop', async () => {
      source.doc = PLAN_A;
      monitor.start();
      await vi.waitFor(() => expect(renderer.frames).toHaveLength(1));
      await monitor.stop();
      const readsAtStop = source.reads;

      await new Promise((resolve) => setTimeout(resolve, 100));

      expect(source.reads).toBe(readsAtStop);
    });

    it('should repaint the current document after a restart', async () => {
      source.doc = PLAN_A;
      monitor.start();
      await vi.waitFor(() => expect(renderer.frames).toHaveLength(1));
      await monitor.stop();

      monitor.start();
      await vi.waitFor(() => expect(renderer.frames).toHaveLength(2));

      expect(renderer.frames).toEqual([PLAN_A, PLAN_A]);
    });

    it('should emit monitor:stopped', async () => {
      const handler = vi.fn();
      monitor.on('monitor:stopped', handler);
      monitor.start();

      await monitor.stop();

      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should not settle when it was never started', async () => {
      await monitor.stop();

      expect(renderer.settles).toBe(0);
    });

    it('should keep running through read failures', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      source.error = new Error('temporarily unavailable');
      monitor.start();
      await vi.waitFor(() => expect(source.reads).toBeGreaterThan(2));

      source.error = null;
      source.doc = PLAN_A;
      await vi.waitFor(() => expect(renderer.frames).toHaveLength(1));

      expect(monitor.isRunning()).toBe(true);
    });
  });
});
