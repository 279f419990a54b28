/**
 * Checks on configuration values that parsing alone cannot make: interview
 * limits within bounds, non-empty paths (and, given a checker, existing
 * ones), and a command on every enabled hook. All violations are gathered
 * before anything is reported.
 *
 * @packageDocumentation
 */

import type { Config, SessionHookConfig } from './types.js';

export interface ValidationError {
  /** Dotted path of the offending field, e.g. `interview.max_rounds`. */
  field: string;
  value: unknown;
  message: string;
}

export class ConfigValidationError extends Error {
  readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface PathCheckResult {
  exists: boolean;
  isDirectory?: boolean | undefined;
  /** Replaces the default "does not exist" message. */
  errorMessage?: string | undefined;
}

/** Looks a path up on disk; injected so validation stays pure in tests. */
export type PathChecker = (path: string, isDirectory: boolean) => PathCheckResult;

export interface ValidateConfigOptions {
  /** Existence checks run only when a checker is supplied. */
  pathChecker?: PathChecker | undefined;
}

export const MAX_ROUNDS_LIMIT = 50;

export const MAX_BATCH_SIZE_LIMIT = 20;

/**
 * Accumulates violations for one validation pass.
 */
class Violations {
  readonly list: ValidationError[] = [];

  add(field: string, value: unknown, message: string): void {
    this.list.push({ field, value, message });
  }

  limit(field: string, value: number, max: number): void {
    if (!Number.isInteger(value) || value < 1) {
      this.add(field, value, `'${field}' must be a positive integer, got ${String(value)}`);
    } else if (value > max) {
      this.add(field, value, `'${field}' exceeds reasonable maximum of ${String(max)}`);
    }
  }

  /** Returns whether the path is usable for further checks. */
  path(field: string, value: string): boolean {
    if (value.trim().length > 0) {
      return true;
    }
    this.add(field, value, `'${field}' must not be empty`);
    return false;
  }

  existing(field: string, value: string, wantDirectory: boolean, checker: PathChecker): void {
    const found = checker(value, wantDirectory);
    if (!found.exists) {
      this.add(field, value, found.errorMessage ?? `Path does not exist: '${value}'`);
    } else if (wantDirectory && found.isDirectory === false) {
      this.add(field, value, `Path exists but is not a directory: '${value}'`);
    }
  }

  hook(field: string, hook: SessionHookConfig | undefined): void {
    if (hook === undefined || !hook.enabled || hook.command.trim() !== '') {
      return;
    }
    this.add(`${field}.command`, hook.command, `Enabled hook '${field}' has an empty command`);
  }
}

/**
 * @example
 * ```typescript
 * const { valid, errors } = validateConfig(parseConfig(text));
 * if (!valid) errors.forEach((e) => console.error(`${e.field}: ${e.message}`));
 * ```
 */
export function validateConfig(
  config: Config,
  options: ValidateConfigOptions = {}
): ValidationResult {
  const { pathChecker } = options;
  const found = new Violations();
  const { interview, paths, hooks } = config;

  found.limit('interview.max_rounds', interview.max_rounds, MAX_ROUNDS_LIMIT);
  found.limit(
    'interview.max_questions_per_batch',
    interview.max_questions_per_batch,
    MAX_BATCH_SIZE_LIMIT
  );

  if (
    paths.template !== undefined &&
    found.path('paths.template', paths.template) &&
    pathChecker !== undefined
  ) {
    found.existing('paths.template', paths.template, false, pathChecker);
  }
  found.path('paths.sessions', paths.sessions);
  if (found.path('paths.output_dir', paths.output_dir) && pathChecker !== undefined) {
    found.existing('paths.output_dir', paths.output_dir, true, pathChecker);
  }

  found.hook('hooks.on_complete', hooks.on_complete);
  found.hook('hooks.on_abandon', hooks.on_abandon);

  return { valid: found.list.length === 0, errors: found.list };
}

/**
 * @throws ConfigValidationError whose message lists every violation.
 */
export function assertConfigValid(config: Config, options: ValidateConfigOptions = {}): void {
  const { valid, errors } = validateConfig(config, options);
  if (valid) {
    return;
  }
  const lines = errors.map(({ field, message }) => `  - ${field}: ${message}`);
  throw new ConfigValidationError(
    `Configuration validation failed with ${String(errors.length)} error(s):\n${lines.join('\n')}`,
    errors
  );
}
