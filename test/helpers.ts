/**
 * @fileoverview Shared fixtures for planwatch tests.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { PlanDocument, PlanSource, TextSink, TodoItem } from '../src/types.js';
import type { FrameRenderer } from '../src/plan-monitor.js';

/** Creates a fresh directory under the OS temp dir. */
export function createTestDir(): string {
  return mkdtempSync(join(tmpdir(), 'planwatch-test-'));
}

export function removeTestDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function makePlan(todos: TodoItem[], explanation = 'Test plan'): PlanDocument {
  return { explanation, updated_at: '2026-01-15 09:05:03', todos };
}

/** Collects everything written to it. */
export class MemorySink implements TextSink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get output(): string {
    return this.chunks.join('');
  }
}

/** Plan source whose next result is set by the test. */
export class FakeSource implements PlanSource {
  doc: PlanDocument | null = null;
  error: Error | null = null;
  reads = 0;

  async read(): Promise<PlanDocument | null> {
    this.reads++;
    if (this.error) throw this.error;
    return this.doc ? structuredClone(this.doc) : null;
  }
}

/** Renderer that records frames instead of drawing them. */
export class RecordingRenderer implements FrameRenderer {
  readonly frames: PlanDocument[] = [];
  settles = 0;

  render(doc: PlanDocument): void {
    this.frames.push(doc);
  }

  settle(): void {
    this.settles++;
  }
}
