/**
 * Reads clarion.toml into a {@link Config}.
 *
 * Only types are checked here; value ranges belong to `validateConfig`.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG } from './defaults.js';
import type {
  CliSettingsConfig,
  Config,
  HooksConfig,
  InterviewConfig,
  LoggingConfig,
  PathConfig,
  SessionHookConfig,
} from './types.js';

export class ConfigParseError extends Error {
  /** TOML syntax error behind the failure, when there is one. */
  public override readonly cause: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type RawTable = Record<string, unknown>;

interface Expectation<T> {
  readonly name: string;
  matches(value: unknown): value is T;
}

const TABLE: Expectation<RawTable> = {
  name: 'table',
  matches: (value): value is RawTable =>
    typeof value === 'object' && value !== null && !Array.isArray(value),
};
const STRING: Expectation<string> = {
  name: 'string',
  matches: (value): value is string => typeof value === 'string',
};
const NUMBER: Expectation<number> = {
  name: 'number',
  matches: (value): value is number => typeof value === 'number',
};
const BOOLEAN: Expectation<boolean> = {
  name: 'boolean',
  matches: (value): value is boolean => typeof value === 'boolean',
};

function expectValue<T>(value: unknown, path: string, expected: Expectation<T>): T {
  if (expected.matches(value)) {
    return value;
  }
  const actual = Array.isArray(value) ? 'array' : typeof value;
  throw new ConfigParseError(
    `Invalid type for '${path}': expected ${expected.name}, got ${actual}`
  );
}

/**
 * Reads `table[key]` when present. Absent keys yield undefined; present
 * keys of the wrong type throw.
 */
function optional<T>(
  table: RawTable | undefined,
  key: string,
  path: string,
  expected: Expectation<T>
): T | undefined {
  if (table === undefined || !(key in table)) {
    return undefined;
  }
  return expectValue(table[key], path, expected);
}

function section(root: RawTable, name: string): RawTable | undefined {
  return optional(root, name, name, TABLE);
}

function readInterview(raw: RawTable | undefined): InterviewConfig {
  const defaults = DEFAULT_CONFIG.interview;
  return {
    max_rounds:
      optional(raw, 'max_rounds', 'interview.max_rounds', NUMBER) ?? defaults.max_rounds,
    max_questions_per_batch:
      optional(raw, 'max_questions_per_batch', 'interview.max_questions_per_batch', NUMBER) ??
      defaults.max_questions_per_batch,
  };
}

function readPaths(raw: RawTable | undefined): PathConfig {
  const defaults = DEFAULT_CONFIG.paths;
  return {
    template: optional(raw, 'template', 'paths.template', STRING) ?? defaults.template,
    sessions: optional(raw, 'sessions', 'paths.sessions', STRING) ?? defaults.sessions,
    output_dir: optional(raw, 'output_dir', 'paths.output_dir', STRING) ?? defaults.output_dir,
  };
}

function readLogging(raw: RawTable | undefined): LoggingConfig {
  return {
    debug: optional(raw, 'debug', 'logging.debug', BOOLEAN) ?? DEFAULT_CONFIG.logging.debug,
  };
}

function readCli(raw: RawTable | undefined): CliSettingsConfig {
  const defaults = DEFAULT_CONFIG.cli;
  return {
    colors: optional(raw, 'colors', 'cli.colors', BOOLEAN) ?? defaults.colors,
    unicode: optional(raw, 'unicode', 'cli.unicode', BOOLEAN) ?? defaults.unicode,
  };
}

/** A hook with a command is enabled unless it says otherwise. */
function readHook(hooks: RawTable | undefined, name: string): SessionHookConfig | undefined {
  const path = `hooks.${name}`;
  const table = optional(hooks, name, path, TABLE);
  if (table === undefined) {
    return undefined;
  }
  if (!('command' in table)) {
    throw new ConfigParseError(`Missing required field '${path}.command'`);
  }
  return {
    command: expectValue(table.command, `${path}.command`, STRING),
    enabled: optional(table, 'enabled', `${path}.enabled`, BOOLEAN) ?? true,
  };
}

function readHooks(raw: RawTable | undefined): HooksConfig {
  const hooks: HooksConfig = {};
  const onComplete = readHook(raw, 'on_complete');
  const onAbandon = readHook(raw, 'on_abandon');
  if (onComplete !== undefined) {
    hooks.on_complete = onComplete;
  }
  if (onAbandon !== undefined) {
    hooks.on_abandon = onAbandon;
  }
  return hooks;
}

/**
 * Parses TOML text, filling every missing field from the defaults.
 * Unknown sections and keys are ignored.
 *
 * @throws ConfigParseError for TOML syntax errors and mistyped values.
 *
 * @example
 * ```typescript
 * const config = parseConfig('[interview]\nmax_rounds = 4\n');
 * config.interview.max_rounds; // 4
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let root: RawTable;
  try {
    root = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    interview: readInterview(section(root, 'interview')),
    paths: readPaths(section(root, 'paths')),
    logging: readLogging(section(root, 'logging')),
    cli: readCli(section(root, 'cli')),
    hooks: readHooks(section(root, 'hooks')),
  };
}

/** A default configuration that callers may mutate. */
export function getDefaultConfig(): Config {
  return {
    interview: { ...DEFAULT_CONFIG.interview },
    paths: { ...DEFAULT_CONFIG.paths },
    logging: { ...DEFAULT_CONFIG.logging },
    cli: { ...DEFAULT_CONFIG.cli },
    hooks: {},
  };
}
