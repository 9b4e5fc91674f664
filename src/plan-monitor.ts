/**
 * @fileoverview Plan Monitor - live display of the plan file
 *
 * Polls a plan source on a fixed interval and repaints the terminal view
 * only when the document actually changed. The monitor shares no memory
 * with producers; it only ever sees what the store has persisted.
 *
 * Change detection uses a SHA-256 of the document's JSON, so identical
 * documents never repaint even if the file was rewritten.
 *
 * @module plan-monitor
 */

import { createHash } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { DEFAULT_POLL_INTERVAL_MS } from './config/plan-defaults.js';
import { getErrorMessage, type PlanDocument, type PlanSource } from './types.js';

// ========== Types ==========

/** What the monitor needs from a renderer */
export interface FrameRenderer {
  render(doc: PlanDocument): void;
  settle(): void;
}

export interface PlanMonitorOptions {
  /** Time between polls (default: 2000ms) */
  pollIntervalMs?: number;
}

/** Comparison key for change detection. */
export function documentKey(doc: PlanDocument): string {
  return createHash('sha256').update(JSON.stringify(doc)).digest('hex');
}

// ========== PlanMonitor Class ==========

/**
 * Emits `monitor:render` (document), `monitor:error` (Error) and
 * `monitor:stopped`.
 *
 * @example
 * ```typescript
 * const monitor = new PlanMonitor(store, new PlanRenderer(), { pollIntervalMs: 2000 });
 * monitor.start();
 * await runResearch();
 * await monitor.stop();
 * ```
 */
export class PlanMonitor extends EventEmitter {
  private readonly source: PlanSource;
  private readonly renderer: FrameRenderer;
  private readonly pollIntervalMs: number;

  private _isRunning = false;
  private loopPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  private lastKey: string | null = null;
  private lastErrorMessage: string | null = null;
  private renderCount = 0;

  constructor(source: PlanSource, renderer: FrameRenderer, options: PlanMonitorOptions = {}) {
    super();
    this.source = source;
    this.renderer = renderer;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  // ========== Public API ==========

  /**
   * Starts the poll loop. The first poll runs immediately.
   * Calling start() while running does nothing. A restart repaints the
   * current document, since stop() settled the previous region.
   */
  start(): void {
    if (this._isRunning) return;
    this._isRunning = true;
    this.lastKey = null;
    this.loopPromise = this.runLoop();
  }

  /**
   * Stops the loop, waits for an in-flight poll to finish, paints the final
   * state and settles the terminal. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown().finally(() => {
        this.stopPromise = null;
      });
    }
    return this.stopPromise;
  }

  isRunning(): boolean {
    return this._isRunning;
  }

  /** Number of frames handed to the renderer so far */
  getRenderCount(): number {
    return this.renderCount;
  }

  /**
   * Runs one poll cycle: read, compare, render on change.
   * Never throws; read and render failures are logged and emitted.
   *
   * @returns true if a frame was rendered
   */
  async poll(): Promise<boolean> {
    let doc: PlanDocument | null;
    try {
      doc = await this.source.read();
    } catch (err) {
      this.reportError(err, 'read plan');
      return false;
    }
    this.lastErrorMessage = null;

    // Nothing written yet
    if (!doc) return false;

    const key = documentKey(doc);
    if (key === this.lastKey) return false;

    try {
      this.renderer.render(doc);
    } catch (err) {
      this.reportError(err, 'render plan');
      return false;
    }

    this.lastKey = key;
    this.renderCount++;
    this.emit('monitor:render', doc);
    return true;
  }

  // ========== Internals ==========

  private async runLoop(): Promise<void> {
    while (this._isRunning) {
      await this.poll();
      if (!this._isRunning) break;
      await this.sleep(this.pollIntervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        if (this.sleepTimer) {
          clearTimeout(this.sleepTimer);
          this.sleepTimer = null;
        }
        this.wake = null;
        resolve();
      };
      this.wake = done;
      this.sleepTimer = setTimeout(done, ms);
    });
  }

  private async shutdown(): Promise<void> {
    const loop = this.loopPromise;
    this._isRunning = false;
    this.wake?.();

    if (loop) {
      await loop;
      this.loopPromise = null;
      await this.poll();
      this.renderer.settle();
    }
    this.emit('monitor:stopped');
  }

  private reportError(err: unknown, action: string): void {
    const error = err instanceof Error ? err : new Error(String(err));
    const message = getErrorMessage(err);
    // Same failure every poll would flood the log
    if (message !== this.lastErrorMessage) {
      console.warn(`[PlanMonitor] Failed to ${action}, retrying next poll: ${message}`);
      this.lastErrorMessage = message;
    }
    this.emit('monitor:error', error);
  }
}
