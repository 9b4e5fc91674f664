/**
 * @fileoverview Research session bootstrap.
 *
 * Wires a fresh plan file, a renderer and a monitor together. Any plan left
 * by a previous session is deleted at start; the plan written during this
 * session stays on disk afterwards for inspection.
 *
 * @module plan-session
 */

import { spawn } from 'node:child_process';
import { PLAN_FILE_ENV } from './config/plan-defaults.js';
import { PlanMonitor } from './plan-monitor.js';
import { PlanRenderer } from './plan-renderer.js';
import { PlanStore } from './plan-store.js';
import { completedWork } from './plan-tool.js';
import { getErrorMessage, type PlanDocument, type TextSink } from './types.js';

export interface PlanSessionOptions {
  /** Plan file path */
  filePath: string;
  /** Monitor poll interval */
  pollIntervalMs?: number;
  /** Where frames are written (default: process.stdout) */
  output?: TextSink;
  /** Force colors on or off */
  color?: boolean;
}

export interface PlanSession {
  store: PlanStore;
  monitor: PlanMonitor;
  /** Stops the monitor and returns the final plan, or null if none was written */
  stop(): Promise<PlanDocument | null>;
}

/**
 * Resets the plan file and starts monitoring it.
 * @throws StorageError when the previous plan cannot be removed
 */
export async function startPlanSession(options: PlanSessionOptions): Promise<PlanSession> {
  const store = new PlanStore(options.filePath);
  if (await store.reset()) {
    console.debug(`[PlanSession] Removed previous research plan: ${store.getFilePath()}`);
  }

  const renderer = new PlanRenderer(options.output, { color: options.color });
  const monitor = new PlanMonitor(store, renderer, { pollIntervalMs: options.pollIntervalMs });
  monitor.start();

  return {
    store,
    monitor,
    async stop() {
      await monitor.stop();
      return store.read();
    },
  };
}

// ========== Worker Runs ==========

export interface WorkerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** A running worker command */
export interface WorkerProcess {
  /** Settles when the worker exits; rejects when it cannot be started */
  exited: Promise<WorkerExit>;
  kill(signal: NodeJS.Signals): void;
}

export type WorkerLauncher = (command: string, args: string[], env: NodeJS.ProcessEnv) => WorkerProcess;

export interface RunSessionOptions extends PlanSessionOptions {
  /** Starts the worker (default: child_process.spawn with inherited stdio) */
  launch?: WorkerLauncher;
  /** Where SIGINT/SIGTERM are received (default: process) */
  signals?: NodeJS.EventEmitter;
}

export interface RunResult {
  /** Exit code for planwatch itself: the worker's code, or 128 + signal number */
  exitCode: number;
  /** Signal that cancelled the run, if any */
  signal: NodeJS.Signals | null;
  /** Plan as left by the worker */
  plan: PlanDocument | null;
}

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

function signalExitCode(signal: NodeJS.Signals): number {
  return SIGNAL_EXIT_CODES[signal] ?? 1;
}

export const spawnWorker: WorkerLauncher = (command, args, env) => {
  const child = spawn(command, args, { stdio: 'inherit', env });
  const exited = new Promise<WorkerExit>((resolve, reject) => {
    child.once('error', reject);
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });
  return {
    exited,
    kill: (signal) => {
      child.kill(signal);
    },
  };
};

/**
 * Runs a worker command inside a plan session.
 *
 * SIGINT and SIGTERM do not kill planwatch: the worker is left to exit
 * (a terminal delivers Ctrl+C to the whole process group; SIGTERM is
 * forwarded), then the monitor stops and settles as after a normal exit.
 *
 * @throws StorageError when the session cannot be started
 */
export async function runPlanSession(
  command: string,
  args: string[],
  options: RunSessionOptions,
): Promise<RunResult> {
  const { launch = spawnWorker, signals = process, ...sessionOptions } = options;
  const run: { cancelledBy: NodeJS.Signals | null; worker: WorkerProcess | null } = {
    cancelledBy: null,
    worker: null,
  };

  const onSignal = (signal: NodeJS.Signals) => {
    run.cancelledBy = signal;
    if (signal !== 'SIGINT') {
      run.worker?.kill(signal);
    }
  };
  signals.on('SIGINT', onSignal);
  signals.on('SIGTERM', onSignal);

  try {
    const session = await startPlanSession(sessionOptions);

    let exitCode: number;
    if (run.cancelledBy) {
      exitCode = signalExitCode(run.cancelledBy);
    } else {
      try {
        const worker = launch(command, args, { ...process.env, [PLAN_FILE_ENV]: session.store.getFilePath() });
        run.worker = worker;
        const exit = await worker.exited;
        const signal = exit.signal ?? run.cancelledBy;
        exitCode = exit.code ?? (signal ? signalExitCode(signal) : 1);
      } catch (err) {
        console.error(`[PlanSession] Failed to run ${command}: ${getErrorMessage(err)}`);
        exitCode = 1;
      }
    }

    const plan = await session.stop();
    return { exitCode, signal: run.cancelledBy, plan };
  } finally {
    signals.off('SIGINT', onSignal);
    signals.off('SIGTERM', onSignal);
  }
}

/** Closing line printed after a run. */
export function formatRunSummary(plan: PlanDocument | null): string {
  if (!plan) {
    return 'No research plan was written';
  }
  return `Completed ${completedWork(plan).length} of ${plan.todos.length} planned steps`;
}
