/**
 * Version command handler for the clarion CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { CliCommandResult, Writer } from '../types.js';

const PACKAGE_JSON_PATH = fileURLToPath(new URL('../../../package.json', import.meta.url));

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if it cannot be read.
 */
export function getVersionFromPackageJson(path: string = PACKAGE_JSON_PATH): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return '(unknown)';
  }
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return typeof parsed.version === 'string' ? parsed.version : '(unknown)';
  }
  return '(unknown)';
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(
  write: Writer = (text) => {
    process.stdout.write(text);
  }
): CliCommandResult {
  write(`clarion v${getVersionFromPackageJson()}\n`);
  return { exitCode: 0 };
}
