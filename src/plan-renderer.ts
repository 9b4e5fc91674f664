/**
 * @fileoverview In-place terminal view of the research plan.
 *
 * The first frame saves the cursor position (the anchor). Every later frame
 * restores the anchor and clears to the end of the screen before writing,
 * so repaints land on the same region instead of scrolling new lines.
 * Frames never end with a newline; that would move the region down on each
 * repaint.
 *
 * @module plan-renderer
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { MAX_CONTENT_LENGTH, RULE_WIDTH } from './config/plan-defaults.js';
import { countByStatus } from './plan-merge.js';
import { TODO_STATUSES, type PlanDocument, type TextSink, type TodoStatus } from './types.js';
import { CLEAR_TO_END, CURSOR_RESTORE, CURSOR_SAVE, stripAnsi, truncate } from './utils/ansi.js';

/** Glyph shown next to each status */
export const STATUS_GLYPHS: Record<TodoStatus, string> = {
  pending: '⏳',
  in_progress: '🔄',
  completed: '✅',
};

export interface PlanRendererOptions {
  /** Force colors on or off. Auto-detected from the terminal when omitted. */
  color?: boolean;
  /** Item descriptions longer than this are truncated with `...` */
  maxContentLength?: number;
  /** Width of the closing rule */
  ruleWidth?: number;
}

/**
 * Strips escape sequences and turns every remaining control character
 * (C0, DEL, C1) into a space so each entry stays on one line.
 */
function toSingleLine(text: string): string {
  return stripAnsi(text)
    .replace(/[\x00-\x1f\x7f-\x9f]+/g, ' ')
    .trim();
}

export class PlanRenderer {
  private readonly output: TextSink;
  private readonly chalk: ChalkInstance;
  private readonly maxContentLength: number;
  private readonly ruleWidth: number;
  private anchored = false;
  private frameCount = 0;

  constructor(output: TextSink = process.stdout, options: PlanRendererOptions = {}) {
    this.output = output;
    this.chalk = options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });
    this.maxContentLength = options.maxContentLength ?? MAX_CONTENT_LENGTH;
    this.ruleWidth = options.ruleWidth ?? RULE_WIDTH;
  }

  /**
   * Formats a document as a frame. Pure: same document, same string.
   */
  formatFrame(doc: PlanDocument): string {
    const c = this.chalk;
    const counts = countByStatus(doc.todos);
    const lines: string[] = [];

    lines.push(c.bold(`📋 Research Plan (updated ${doc.updated_at})`));
    const explanation = toSingleLine(doc.explanation);
    if (explanation) {
      lines.push(`   Last change: ${explanation}`);
    }

    lines.push(c.bold(`📊 Progress: ${doc.todos.length} tasks total`));
    for (const status of TODO_STATUSES) {
      lines.push(`   ${STATUS_GLYPHS[status]} ${this.colorStatus(status, status)}: ${counts[status]}`);
    }

    lines.push(c.bold('Current Plan:'));
    if (doc.todos.length === 0) {
      lines.push(c.gray('   (no items)'));
    }
    doc.todos.forEach((todo, i) => {
      const index = String(i + 1).padStart(2);
      const status = this.colorStatus(todo.status, `[${todo.status.padEnd(12)}]`);
      const content = truncate(toSingleLine(todo.content), this.maxContentLength);
      lines.push(`   ${index}. ${STATUS_GLYPHS[todo.status]} ${status} ${content}`);
    });

    lines.push(c.gray('='.repeat(this.ruleWidth)));
    return lines.join('\n');
  }

  /**
   * Paints a document over the previous frame.
   * Emits exactly one write per call.
   */
  render(doc: PlanDocument): void {
    const prefix = this.anchored ? CURSOR_RESTORE + CLEAR_TO_END : CURSOR_SAVE;
    this.anchored = true;
    this.frameCount++;
    this.output.write(prefix + this.formatFrame(doc));
  }

  /**
   * Moves the cursor below the last frame and forgets the anchor,
   * so output written afterwards starts on a fresh line.
   */
  settle(): void {
    if (!this.anchored) return;
    this.anchored = false;
    this.output.write('\n');
  }

  /** A standalone frame for one-shot display, without cursor control. */
  renderStatic(doc: PlanDocument): string {
    return this.formatFrame(doc) + '\n';
  }

  isAnchored(): boolean {
    return this.anchored;
  }

  getFrameCount(): number {
    return this.frameCount;
  }

  private colorStatus(status: TodoStatus, text: string): string {
    switch (status) {
      case 'in_progress':
        return this.chalk.yellow(text);
      case 'completed':
        return this.chalk.green(text);
      case 'pending':
        return this.chalk.gray(text);
    }
  }
}
