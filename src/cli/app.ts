/**
 * Application wiring for the clarion CLI.
 */

import { resolve } from 'node:path';
import { loadConfig, type EnvRecord } from '../config/index.js';
import { Logger } from '../utils/logger.js';
import { createInputReader } from './prompt.js';
import type { CliContext, InputReader, Writer } from './types.js';
import { ArgumentError } from './utils/args.js';

/**
 * Options for creating the CLI context. Everything defaults to the process.
 */
export interface CliAppOptions {
  /** Arguments following the command name. */
  readonly args: readonly string[];
  readonly cwd?: string | undefined;
  readonly env?: EnvRecord | undefined;
  readonly stdout?: Writer | undefined;
  readonly stderr?: Writer | undefined;
  readonly createReader?: (() => InputReader) | undefined;
}

/**
 * Removes `--config <path>` (or `-c`, or `--config=<path>`) from the arguments.
 *
 * @returns The remaining arguments and the configuration path, if given.
 * @throws ArgumentError if the flag has no value.
 */
export function extractConfigPath(args: readonly string[]): {
  args: string[];
  configPath: string | undefined;
} {
  const rest: string[] = [];
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--') {
      rest.push(...args.slice(i));
      break;
    }
    if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
      continue;
    }
    if (arg === '--config' || arg === '-c') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new ArgumentError(`Option ${arg} requires a value`);
      }
      configPath = value;
      i++;
      continue;
    }
    rest.push(arg);
  }

  return { args: rest, configPath };
}

/**
 * Creates and initializes the CLI context: loads clarion.toml (or the file
 * given with `--config`), applies CLARION_* overrides and sets up logging.
 *
 * Logging is quiet (warnings and errors only) unless `logging.debug` is on.
 *
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError when
 * the configuration is unusable.
 */
export async function createCliApp(options: CliAppOptions): Promise<CliContext> {
  const cwd = options.cwd ?? process.cwd();
  const { args, configPath } = extractConfigPath(options.args);

  const config = await loadConfig({
    configPath: configPath !== undefined ? resolve(cwd, configPath) : undefined,
    cwd,
    env: options.env ?? process.env,
  });

  const stdout: Writer =
    options.stdout ??
    ((text) => {
      process.stdout.write(text);
    });
  const stderr: Writer =
    options.stderr ??
    ((text) => {
      process.stderr.write(text);
    });

  const logger = new Logger({
    component: 'clarion',
    debugMode: config.logging.debug,
    minLevel: config.logging.debug ? 'debug' : 'warn',
    sink: stderr,
  });

  return {
    args,
    cwd,
    config,
    display: { colors: config.cli.colors, unicode: config.cli.unicode },
    logger,
    stdout,
    stderr,
    createReader: options.createReader ?? (() => createInputReader()),
  };
}
