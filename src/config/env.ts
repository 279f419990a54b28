/**
 * CLARION_* environment overrides.
 *
 * Precedence is env, then the config file, then the defaults. Variables are
 * named CLARION_<SECTION>_<FIELD>; CLARION_DEBUG is kept as a shortcut.
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/** Shape of `process.env`. */
export type EnvRecord = Record<string, string | undefined>;

type EnvValueType = 'string' | 'number' | 'boolean';

/**
 * Raised when a variable holds text that does not read as its declared type.
 */
export class EnvCoercionError extends Error {
  readonly envVar: string;
  readonly rawValue: string;
  readonly expectedType: EnvValueType;

  constructor(envVar: string, rawValue: string, expectedType: EnvValueType, message?: string) {
    super(message ?? `'${envVar}' is set to '${rawValue}', which is not a valid ${expectedType}`);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const BOOLEAN_SPELLINGS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['1', true],
  ['yes', true],
  ['on', true],
  ['false', false],
  ['0', false],
  ['no', false],
  ['off', false],
]);

function readNumber(raw: string, envVar: string): number {
  const text = raw.trim();
  if (text.length === 0) {
    throw new EnvCoercionError(envVar, raw, 'number', `Empty value for '${envVar}'`);
  }
  const parsed = Number(text);
  if (Number.isNaN(parsed)) {
    throw new EnvCoercionError(envVar, raw, 'number');
  }
  return parsed;
}

function readBoolean(raw: string, envVar: string): boolean {
  const parsed = BOOLEAN_SPELLINGS.get(raw.trim().toLowerCase());
  if (parsed === undefined) {
    const accepted = [...BOOLEAN_SPELLINGS.keys()].join(', ');
    throw new EnvCoercionError(
      envVar,
      raw,
      'boolean',
      `Cannot coerce '${envVar}' value '${raw}' to boolean. Expected one of: ${accepted}`
    );
  }
  return parsed;
}

/**
 * One supported variable. `bind` coerces the raw text up front and returns
 * the edit to make, so a bad value fails before anything is written.
 */
interface EnvBinding {
  readonly type: EnvValueType;
  readonly description: string;
  bind(raw: string, envVar: string): (target: PartialConfig) => void;
}

function stringVar(
  description: string,
  assign: (target: PartialConfig, value: string) => void
): EnvBinding {
  return { type: 'string', description, bind: (raw) => (target) => assign(target, raw) };
}

function numberVar(
  description: string,
  assign: (target: PartialConfig, value: number) => void
): EnvBinding {
  return {
    type: 'number',
    description,
    bind: (raw, envVar) => {
      const value = readNumber(raw, envVar);
      return (target) => assign(target, value);
    },
  };
}

function booleanVar(
  description: string,
  assign: (target: PartialConfig, value: boolean) => void
): EnvBinding {
  return {
    type: 'boolean',
    description,
    bind: (raw, envVar) => {
      const value = readBoolean(raw, envVar);
      return (target) => assign(target, value);
    },
  };
}

const setDebug = (target: PartialConfig, debug: boolean): void => {
  target.logging = { ...target.logging, debug };
};

const ENV_BINDINGS: ReadonlyMap<string, EnvBinding> = new Map([
  ['CLARION_DEBUG', booleanVar('Write debug log entries (shortcut for CLARION_LOGGING_DEBUG)', setDebug)],
  ['CLARION_LOGGING_DEBUG', booleanVar('Write debug log entries', setDebug)],
  [
    'CLARION_INTERVIEW_MAX_ROUNDS',
    numberVar('Override the maximum number of question rounds', (target, max_rounds) => {
      target.interview = { ...target.interview, max_rounds };
    }),
  ],
  [
    'CLARION_INTERVIEW_MAX_QUESTIONS_PER_BATCH',
    numberVar('Override the maximum number of questions per batch', (target, max_questions_per_batch) => {
      target.interview = { ...target.interview, max_questions_per_batch };
    }),
  ],
  [
    'CLARION_PATHS_TEMPLATE',
    stringVar('Override the template file', (target, template) => {
      target.paths = { ...target.paths, template };
    }),
  ],
  [
    'CLARION_PATHS_SESSIONS',
    stringVar('Override the sessions directory', (target, sessions) => {
      target.paths = { ...target.paths, sessions };
    }),
  ],
  [
    'CLARION_PATHS_OUTPUT_DIR',
    stringVar('Override the directory documents are written under', (target, output_dir) => {
      target.paths = { ...target.paths, output_dir };
    }),
  ],
  [
    'CLARION_CLI_COLORS',
    booleanVar('Enable or disable ANSI colors (true/false)', (target, colors) => {
      target.cli = { ...target.cli, colors };
    }),
  ],
  [
    'CLARION_CLI_UNICODE',
    booleanVar('Enable or disable Unicode symbols (true/false)', (target, unicode) => {
      target.cli = { ...target.cli, unicode };
    }),
  ],
]);

export interface EnvOverrideResult {
  overrides: PartialConfig;
  /** Variables that were read, in binding order. */
  appliedVars: string[];
  /** Only filled when `collectErrors` is set. */
  errors: EnvCoercionError[];
}

/**
 * Collects the CLARION_* variables that are set and non-empty into a
 * partial configuration.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ CLARION_INTERVIEW_MAX_ROUNDS: '3' });
 * overrides.interview?.max_rounds; // 3
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const result: EnvOverrideResult = { overrides: {}, appliedVars: [], errors: [] };

  for (const [envVar, binding] of ENV_BINDINGS) {
    const raw = env[envVar];
    if (raw === undefined || raw === '') {
      continue;
    }

    let edit: (target: PartialConfig) => void;
    try {
      edit = binding.bind(raw, envVar);
    } catch (error) {
      if (options.collectErrors === true && error instanceof EnvCoercionError) {
        result.errors.push(error);
        continue;
      }
      throw error;
    }
    edit(result.overrides);
    result.appliedVars.push(envVar);
  }

  return result;
}

/**
 * Overlays a partial configuration section by section.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    interview: { ...base.interview, ...partial.interview },
    paths: { ...base.paths, ...partial.paths },
    logging: { ...base.logging, ...partial.logging },
    cli: { ...base.cli, ...partial.cli },
    hooks: { ...base.hooks, ...partial.hooks },
  };
}

/**
 * @throws EnvCoercionError for the first malformed variable.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  return mergeConfig(config, readEnvOverrides(env).overrides);
}

/** Description and value type of each supported variable. */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, { description, type }] of ENV_BINDINGS) {
    docs[envVar] = { description, type };
  }
  return docs;
}
