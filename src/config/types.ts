/**
 * Configuration types for clarion.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Interview pacing.
 */
export interface InterviewConfig {
  /** Maximum number of question rounds before a session fails (default: 8). */
  max_rounds: number;
  /** Maximum number of questions shown together in one batch (default: 4). */
  max_questions_per_batch: number;
}

/**
 * Path configuration for templates, sessions and documents.
 */
export interface PathConfig {
  /** Template file; undefined selects the bundled template. */
  template: string | undefined;
  /** Directory holding one directory per persisted session. */
  sessions: string;
  /** Directory relative output paths are resolved against. */
  output_dir: string;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Whether debug entries are written to stderr. */
  debug: boolean;
}

/**
 * CLI configuration for terminal behavior.
 */
export interface CliSettingsConfig {
  /** Whether to use ANSI colors in output. */
  colors: boolean;
  /** Whether to use Unicode symbols in prompts. */
  unicode: boolean;
}

/**
 * A shell command run when a session ends.
 */
export interface SessionHookConfig {
  /** Shell command; `{path}`, `{title}` and `{session}` are substituted. */
  command: string;
  /** Whether the hook is enabled. */
  enabled: boolean;
}

/**
 * Hooks for session events.
 */
export interface HooksConfig {
  /** Runs after the document has been written. */
  on_complete?: SessionHookConfig | undefined;
  /** Runs when the user abandons a session. */
  on_abandon?: SessionHookConfig | undefined;
}

/**
 * Complete configuration object parsed from clarion.toml.
 */
export interface Config {
  interview: InterviewConfig;
  paths: PathConfig;
  logging: LoggingConfig;
  cli: CliSettingsConfig;
  hooks: HooksConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  interview?: Partial<InterviewConfig>;
  paths?: Partial<PathConfig>;
  logging?: Partial<LoggingConfig>;
  cli?: Partial<CliSettingsConfig>;
  hooks?: HooksConfig;
}
