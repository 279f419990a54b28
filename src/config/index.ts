/**
 * Configuration module for clarion.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  CliSettingsConfig,
  Config,
  HooksConfig,
  InterviewConfig,
  LoggingConfig,
  PartialConfig,
  PathConfig,
  SessionHookConfig,
} from './types.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_CLI_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_HOOKS,
  DEFAULT_INTERVIEW,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
} from './defaults.js';
export {
  ConfigValidationError,
  MAX_BATCH_SIZE_LIMIT,
  MAX_ROUNDS_LIMIT,
  assertConfigValid,
  validateConfig,
} from './validator.js';
export type {
  PathChecker,
  PathCheckResult,
  ValidationError,
  ValidationResult,
  ValidateConfigOptions,
} from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
