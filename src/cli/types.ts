/**
 * CLI types and interfaces for the clarion CLI.
 */

import type { Config } from '../config/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Terminal rendering options.
 */
export interface DisplayOptions {
  /** Whether to use ANSI colors. */
  colors: boolean;
  /** Whether to use Unicode symbols. */
  unicode: boolean;
}

/**
 * Line-oriented input, abstracted for testability.
 */
export interface InputReader {
  /**
   * Prints the prompt and reads one line.
   *
   * @returns The line without its terminator, or null once input has ended.
   */
  readLine(prompt: string): Promise<string | null>;
  /** Releases the underlying stream. */
  close(): void;
}

/**
 * Sink for user-facing text.
 */
export type Writer = (text: string) => void;

/**
 * CLI command context.
 */
export interface CliContext {
  /** Arguments following the command name. */
  args: string[];
  /** Directory relative paths are resolved against. */
  cwd: string;
  /** Effective configuration (defaults, clarion.toml, environment). */
  config: Config;
  display: DisplayOptions;
  logger: Logger;
  /** Prompt and result output. */
  stdout: Writer;
  /** Error output. */
  stderr: Writer;
  /** Opens the input used for interactive answers. */
  createReader: () => InputReader;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string | undefined;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
