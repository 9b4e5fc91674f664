/**
 * @fileoverview Terminal control sequences and ANSI helpers.
 *
 * @module utils/ansi
 */

/** Save cursor position (the renderer's anchor). */
export const CURSOR_SAVE = '\x1b[s';

/** Restore cursor to the last saved position. */
export const CURSOR_RESTORE = '\x1b[u';

/** Clear from cursor to end of screen. */
export const CLEAR_TO_END = '\x1b[J';

/**
 * Comprehensive ANSI escape pattern that handles:
 * - SGR (colors/styles): ESC [ params m
 * - CSI sequences (cursor, scroll, etc.): ESC [ params letter
 * - OSC sequences (title, etc.): ESC ] ... BEL or ESC ] ... ST
 * - Any other two-byte escape: ESC 7, ESC 8, ESC E, ESC c, ESC =, ...
 *
 * Note: Has global flag - reset lastIndex before exec() if reusing.
 */
export const ANSI_ESCAPE_PATTERN_FULL = /\x1b(?:\[[0-9;?]*[A-Za-z]|\][^\x07\x1b]*(?:\x07|\x1b\\)|[\s\S])/g;

/**
 * Strips ANSI escape codes from text.
 * @param text - Text containing ANSI escape codes
 * @returns Text with ANSI codes removed
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN_FULL, '');
}

/**
 * Truncates text to `max` characters, ending with `...` when cut.
 * Counts code points so emoji are never split.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  if (max <= 3) return chars.slice(0, max).join('');
  return chars.slice(0, max - 3).join('') + '...';
}
