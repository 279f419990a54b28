/**
 * ANSI styling shared by CLI output.
 */

import type { DisplayOptions } from './types.js';

/**
 * Escape codes for one display configuration; every code is empty when
 * colors are off.
 */
export interface TerminalStyles {
  readonly bold: string;
  readonly dim: string;
  readonly red: string;
  readonly green: string;
  readonly yellow: string;
  readonly cyan: string;
  readonly reset: string;
  /** Marker in front of each question. */
  readonly questionMark: string;
  /** Separator between header parts. */
  readonly separator: string;
}

export function terminalStyles(options: DisplayOptions): TerminalStyles {
  const code = (value: string): string => (options.colors ? value : '');
  return {
    bold: code('\x1b[1m'),
    dim: code('\x1b[2m'),
    red: code('\x1b[31m'),
    green: code('\x1b[32m'),
    yellow: code('\x1b[33m'),
    cyan: code('\x1b[36m'),
    reset: code('\x1b[0m'),
    questionMark: options.unicode ? '◆' : '?',
    separator: options.unicode ? '·' : '-',
  };
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * Removes ANSI escape sequences.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}
