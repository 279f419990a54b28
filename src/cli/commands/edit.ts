/**
 * `clarion edit`: revise a previously written document.
 */

import { resolve } from 'node:path';
import { createSeed } from '../../synthesis/types.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { ArgumentError, parseArgs } from '../utils/args.js';
import { conductInterview } from './interview.js';

export const EDIT_USAGE = 'clarion edit <file> [--template <path>] [--yes]';

/**
 * Handles the edit command. The document is read as a reference seed and
 * rewritten in place.
 */
export async function handleEditCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, {
    values: { template: 't' },
    switches: { yes: 'y' },
  });

  const [file, ...extra] = parsed.positionals;
  if (file === undefined || extra.length > 0) {
    throw new ArgumentError(`Expected exactly one file. Usage: ${EDIT_USAGE}`);
  }

  await conductInterview(context, {
    start: createSeed('reference', resolve(context.cwd, file)),
    templatePath: parsed.values.get('template') ?? context.config.paths.template,
    outputDir: context.cwd,
    yes: parsed.switches.has('yes'),
  });
  return { exitCode: 0 };
}
