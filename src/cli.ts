/**
 * @fileoverview planwatch CLI command definitions
 *
 * Commands for watching, updating, showing and resetting the research plan,
 * plus `run`, which wraps a worker process in a monitored plan session.
 *
 * @module cli
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { isValidationError } from './errors.js';
import { resolvePlanConfig, type PlanConfig } from './plan-config.js';
import { PlanMonitor } from './plan-monitor.js';
import { PlanRenderer } from './plan-renderer.js';
import { formatRunSummary, runPlanSession, type RunResult } from './plan-session.js';
import { filterByStatus } from './plan-merge.js';
import { PlanStore } from './plan-store.js';
import { formatMergeSummary } from './plan-tool.js';
import { getErrorMessage, isTodoStatus } from './types.js';

interface GlobalOptions {
  file?: string;
  interval?: string;
  color: boolean;
}

const program = new Command();

program
  .name('planwatch')
  .description('Durable research plan store with a live terminal monitor')
  .version('1.0.0')
  .enablePositionalOptions()
  .option('-f, --file <path>', 'Plan file (default: .research_plan.json, or $PLANWATCH_FILE)')
  .option('-i, --interval <ms>', 'Monitor poll interval in milliseconds (default: 2000, or $PLANWATCH_POLL_MS)')
  .option('--no-color', 'Disable colored output');

function loadConfig(): PlanConfig {
  const opts = program.opts<GlobalOptions>();
  try {
    return resolvePlanConfig({ filePath: opts.file, pollIntervalMs: opts.interval });
  } catch (err) {
    console.error(chalk.red(`✗ ${getErrorMessage(err)}`));
    process.exit(1);
  }
}

/** undefined lets chalk detect color support itself */
function colorOption(): boolean | undefined {
  return program.opts<GlobalOptions>().color ? undefined : false;
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
}

function printBanner(title: string): void {
  console.log(`\n${'='.repeat(60)}`);
  console.log(chalk.bold(title));
  console.log('='.repeat(60));
}

// ============ Monitor Commands ============

program
  .command('watch')
  .alias('w')
  .description('Watch the plan file and repaint it in place on every change')
  .action(async () => {
    const config = loadConfig();
    const store = new PlanStore(config.filePath);
    const renderer = new PlanRenderer(process.stdout, { color: colorOption() });
    const monitor = new PlanMonitor(store, renderer, { pollIntervalMs: config.pollIntervalMs });

    printBanner('📋 Research Plan Monitor');
    console.log(chalk.gray(`  ${config.filePath} (every ${config.pollIntervalMs}ms, Ctrl+C to stop)\n`));

    monitor.start();
    await waitForSignal();
    await monitor.stop();
  });

program
  .command('run <command> [args...]')
  .description('Start a fresh plan session, run a worker command and monitor its plan')
  .passThroughOptions()
  .action(async (command: string, args: string[]) => {
    const config = loadConfig();

    printBanner('🔍 Research Session');
    console.log(`Command: ${[command, ...args].join(' ')}`);
    console.log(`Plan:    ${config.filePath}`);
    console.log('='.repeat(60) + '\n');

    let result: RunResult;
    try {
      result = await runPlanSession(command, args, {
        filePath: config.filePath,
        pollIntervalMs: config.pollIntervalMs,
        color: colorOption(),
      });
    } catch (err) {
      console.error(chalk.red(`✗ Failed to start session: ${getErrorMessage(err)}`));
      process.exit(1);
    }

    const summary = formatRunSummary(result.plan);
    console.log(result.plan ? chalk.bold(`\n${summary}`) : chalk.yellow(`\n${summary}`));
    process.exit(result.exitCode);
  });

// ============ Plan Commands ============

program
  .command('update')
  .alias('u')
  .description('Merge TODO updates into the plan')
  .requiredOption('-t, --todos <json>', 'JSON array of {id, status?, content?} items')
  .option('-e, --explanation <text>', 'Short description of the change', '')
  .action(async (options: { todos: string; explanation: string }) => {
    const config = loadConfig();
    let batch: unknown;
    try {
      batch = JSON.parse(options.todos);
    } catch (err) {
      console.error(chalk.red(`✗ --todos is not valid JSON: ${getErrorMessage(err)}`));
      process.exit(1);
    }

    try {
      const doc = await new PlanStore(config.filePath).merge(batch, options.explanation);
      console.log(chalk.green(`✓ ${formatMergeSummary(doc)}`));
    } catch (err) {
      if (isValidationError(err)) {
        console.error(chalk.red('✗ Update rejected:'));
        for (const issue of err.issues) {
          console.error(`  - ${issue}`);
        }
      } else {
        console.error(chalk.red(`✗ Failed to update plan: ${getErrorMessage(err)}`));
      }
      process.exit(1);
    }
  });

program
  .command('show')
  .alias('s')
  .description('Print the current plan once')
  .option('--json', 'Print the raw plan document')
  .option('-s, --status <status>', 'Only list items with this status (pending, in_progress, completed)')
  .action(async (options: { json?: boolean; status?: string }) => {
    const config = loadConfig();
    const status = options.status;
    if (status !== undefined && !isTodoStatus(status)) {
      console.error(chalk.red(`✗ Unknown status: ${status}`));
      process.exit(1);
    }

    try {
      const doc = await new PlanStore(config.filePath).read();
      if (!doc) {
        console.log(chalk.yellow(`No research plan found at ${config.filePath}`));
        return;
      }
      const view = status ? { ...doc, todos: filterByStatus(doc.todos, status) } : doc;
      if (options.json) {
        console.log(JSON.stringify(view, null, 2));
        return;
      }
      process.stdout.write(new PlanRenderer(process.stdout, { color: colorOption() }).renderStatic(view));
    } catch (err) {
      console.error(chalk.red(`✗ Failed to read plan: ${getErrorMessage(err)}`));
      process.exit(1);
    }
  });

program
  .command('reset')
  .description('Delete the plan file')
  .action(async () => {
    const config = loadConfig();
    try {
      const existed = await new PlanStore(config.filePath).reset();
      console.log(existed ? chalk.green(`✓ Removed ${config.filePath}`) : chalk.gray('(no plan file)'));
    } catch (err) {
      console.error(chalk.red(`✗ Failed to reset plan: ${getErrorMessage(err)}`));
      process.exit(1);
    }
  });

export { program };
