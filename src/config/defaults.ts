/**
 * Default configuration values for clarion.toml.
 *
 * @packageDocumentation
 */

import type {
  CliSettingsConfig,
  Config,
  HooksConfig,
  InterviewConfig,
  LoggingConfig,
  PathConfig,
} from './types.js';

/** Name of the configuration file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'clarion.toml';

/**
 * Default interview pacing.
 */
export const DEFAULT_INTERVIEW: InterviewConfig = {
  max_rounds: 8,
  max_questions_per_batch: 4,
};

/**
 * Default path configuration relative to the working directory.
 */
export const DEFAULT_PATHS: PathConfig = {
  template: undefined,
  sessions: '.clarion/sessions',
  output_dir: '.',
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Default CLI configuration.
 */
export const DEFAULT_CLI_CONFIG: CliSettingsConfig = {
  colors: true,
  unicode: true,
};

/** No hooks run unless configured. */
export const DEFAULT_HOOKS: HooksConfig = {};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  interview: DEFAULT_INTERVIEW,
  paths: DEFAULT_PATHS,
  logging: DEFAULT_LOGGING,
  cli: DEFAULT_CLI_CONFIG,
  hooks: DEFAULT_HOOKS,
};
