/**
 * Shared error handling utilities for CLI commands.
 *
 * Standardizes how failures turn into output and exit codes across command
 * handlers.
 */

import { displayErrorWithSuggestions, exitCodeFor } from '../errors.js';
import type { CliCommandHandler, CliCommandResult, CliContext, DisplayOptions } from '../types.js';

/**
 * Runs a command handler, reporting any error with suggestions.
 *
 * A message on the handler's result is written to stderr.
 *
 * @returns The handler's result, or the exit code for the error it raised.
 */
export async function runCommand(
  handler: CliCommandHandler,
  context: CliContext
): Promise<CliCommandResult> {
  try {
    const result = await handler(context);
    if (result.message !== undefined) {
      context.stderr(`${result.message}\n`);
    }
    return result;
  } catch (error) {
    context.logger.debug('command_failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    displayErrorWithSuggestions(error, context.display, context.stderr);
    return { exitCode: exitCodeFor(error) };
  }
}

/**
 * Wraps a command with standard error handling and exits the process.
 *
 * Errors raised before a context exists (configuration loading) are reported
 * with the given display options.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  display: DisplayOptions = { colors: process.stderr.isTTY, unicode: true }
): void {
  void (async () => {
    try {
      const result = await fn();
      process.exit(result.exitCode);
    } catch (error) {
      displayErrorWithSuggestions(error, display);
      process.exit(exitCodeFor(error));
    }
  })();
}
