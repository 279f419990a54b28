/**
 * Error suggestion system for the clarion CLI.
 *
 * Maps each failure to a category, contextual details, suggestions and an
 * exit code.
 *
 * @packageDocumentation
 */

import { ConfigParseError } from '../config/parser.js';
import { EnvCoercionError } from '../config/env.js';
import { ConfigValidationError } from '../config/validator.js';
import {
  AbandonedSessionError,
  IncompleteStateError,
  InvalidAnswerError,
  RoundLimitError,
  UnresolvableSeedError,
} from '../synthesis/errors.js';
import { SessionPersistenceError } from '../synthesis/persistence.js';
import { TemplateParseError } from '../template/parser.js';
import { PathValidationError } from '../utils/safe-fs.js';
import { terminalStyles } from './styles.js';
import type { DisplayOptions } from './types.js';
import { ArgumentError } from './utils/args.js';

/**
 * Categories of CLI failures.
 */
export type ErrorType =
  | 'unresolvable_seed'
  | 'abandoned'
  | 'invalid_answer'
  | 'round_limit'
  | 'incomplete_state'
  | 'template_error'
  | 'config_error'
  | 'session_error'
  | 'usage_error'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string | undefined;
}

/** Exit code for sessions the user abandoned (matches SIGINT). */
export const ABANDONED_EXIT_CODE = 130;

/**
 * Determines the category of an error.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof UnresolvableSeedError || error instanceof PathValidationError) {
    return 'unresolvable_seed';
  }
  if (error instanceof AbandonedSessionError) {
    return 'abandoned';
  }
  if (error instanceof InvalidAnswerError) {
    return 'invalid_answer';
  }
  if (error instanceof RoundLimitError) {
    return 'round_limit';
  }
  if (error instanceof IncompleteStateError) {
    return 'incomplete_state';
  }
  if (error instanceof TemplateParseError) {
    return 'template_error';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'config_error';
  }
  if (error instanceof SessionPersistenceError) {
    return 'session_error';
  }
  if (error instanceof ArgumentError) {
    return 'usage_error';
  }
  return 'unknown';
}

/**
 * Exit code for a failed command.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof AbandonedSessionError ? ABANDONED_EXIT_CODE : 1;
}

/**
 * Gets suggestions for an error.
 */
export function getSuggestions(error: unknown): readonly Suggestion[] {
  switch (classifyError(error)) {
    case 'unresolvable_seed':
      return [
        { text: 'Check that the file exists and is readable', action: 'ls -l <file>' },
        {
          text: 'Describe the work in words instead',
          action: 'clarion new "rate limiter for login endpoint"',
        },
      ];
    case 'abandoned': {
      const sessionId = error instanceof AbandonedSessionError ? error.sessionId : '<session-id>';
      return [
        { text: 'No document was written; answers so far were saved', action: `clarion resume ${sessionId}` },
      ];
    }
    case 'invalid_answer':
      return [
        { text: 'Pick one of the numbered options or give a concrete value' },
        { text: 'Answer interactively instead of accepting recommendations', action: 'omit --yes' },
      ];
    case 'round_limit':
      return [
        { text: 'Raise the round cap in clarion.toml', action: '[interview]\nmax_rounds = 12' },
        { text: 'Or for one run', action: 'CLARION_INTERVIEW_MAX_ROUNDS=12 clarion ...' },
      ];
    case 'incomplete_state':
      return [
        { text: 'Some fields were never resolved; this indicates a template or session defect' },
        { text: 'Run with debug logging for details', action: 'CLARION_DEBUG=1 clarion ...' },
      ];
    case 'template_error':
      return [
        { text: 'Fix the template file named in the error' },
        { text: 'Or fall back to the bundled template', action: 'remove paths.template from clarion.toml' },
      ];
    case 'config_error':
      return [
        { text: 'Fix the setting named in the error in clarion.toml or the environment' },
        { text: 'Unset CLARION_* variables to rule them out', action: 'env | grep CLARION_' },
      ];
    case 'session_error':
      return [
        { text: 'Check the session id', action: 'ls .clarion/sessions' },
        { text: 'Start a new session if the saved one is damaged', action: 'clarion new "<description>"' },
      ];
    case 'usage_error':
      return [{ text: 'See the available commands and options', action: 'clarion help' }];
    case 'unknown':
      return [
        { text: 'Run with debug logging for details', action: 'CLARION_DEBUG=1 clarion ...' },
      ];
  }
}

/**
 * Extra lines describing the error, beyond its message.
 */
function errorDetails(error: unknown): string[] {
  if (error instanceof InvalidAnswerError) {
    return error.validationDetails.map((d) => `${d.field}: ${d.message}`);
  }
  if (error instanceof RoundLimitError) {
    return [`Open: ${error.remaining.join(', ')}`];
  }
  if (error instanceof UnresolvableSeedError && error.seedPath !== undefined) {
    return [`File: ${error.seedPath}`];
  }
  if (error instanceof SessionPersistenceError && error.details !== undefined) {
    return [error.details];
  }
  return [];
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const s = terminalStyles(options);
  const prefix = `${s.yellow}${String(index)}.${s.reset}`;
  const actionText =
    suggestion.action !== undefined
      ? '\n' + suggestion.action.split('\n').map((line) => `    ${s.dim}${line}${s.reset}`).join('\n')
      : '';
  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats an error with its details and suggestions.
 */
export function formatErrorWithSuggestions(
  error: unknown,
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const s = terminalStyles(options);
  const message = error instanceof Error ? error.message : String(error);

  let result = `${s.red}Error:${s.reset} ${message}`;
  for (const detail of errorDetails(error)) {
    result += `\n  ${s.yellow}-${s.reset} ${detail}`;
  }

  result += `\n\n${s.bold}Suggestions:${s.reset}`;
  getSuggestions(error).forEach((suggestion, index) => {
    result += '\n' + formatSuggestion(suggestion, index + 1, options);
  });

  return result;
}

/**
 * Writes an error with suggestions to stderr.
 */
export function displayErrorWithSuggestions(
  error: unknown,
  options: DisplayOptions = { colors: true, unicode: true },
  write: (text: string) => void = (text) => process.stderr.write(text)
): void {
  write(`\n${formatErrorWithSuggestions(error, options)}\n\n`);
}
