/**
 * Loads the effective configuration: defaults, then clarion.toml, then
 * CLARION_* environment variables, then semantic validation.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import { isNotFoundError, safeReadTextFile } from '../utils/safe-fs.js';
import { CONFIG_FILE_NAME } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Options for loading configuration.
 */
export interface LoadConfigOptions {
  /** Explicit configuration file; it must exist. */
  readonly configPath?: string | undefined;
  /** Directory searched for clarion.toml when no path is given. */
  readonly cwd?: string | undefined;
  readonly env?: EnvRecord | undefined;
}

/**
 * Loads and validates the configuration.
 *
 * A missing clarion.toml in the working directory is not an error; a missing
 * explicit `configPath` is.
 *
 * @throws ConfigParseError for unreadable or malformed files.
 * @throws EnvCoercionError for malformed environment overrides.
 * @throws ConfigValidationError for out-of-range values.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const explicit = options.configPath;
  const path = explicit ?? join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  let fileConfig: Config;
  try {
    fileConfig = parseConfig(await safeReadTextFile(path));
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new ConfigParseError(`Invalid configuration file "${path}": ${error.message}`, error);
    }
    if (isNotFoundError(error) && explicit === undefined) {
      fileConfig = getDefaultConfig();
    } else {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigParseError(
        `Failed to read configuration file "${path}": ${cause.message}`,
        cause
      );
    }
  }

  const config = applyEnvOverrides(fileConfig, options.env ?? process.env);
  assertConfigValid(config);
  return config;
}
