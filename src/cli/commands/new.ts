/**
 * `clarion new`: start an interview from a free-text description.
 */

import { resolve } from 'node:path';
import { createSeed } from '../../synthesis/types.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { ArgumentError, parseArgs } from '../utils/args.js';
import { conductInterview } from './interview.js';

export const NEW_USAGE = 'clarion new <description...> [--output <path>] [--template <path>] [--yes]';

/**
 * Handles the new command.
 *
 * The description is every positional argument joined with spaces, so it
 * need not be quoted.
 */
export async function handleNewCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, {
    values: { output: 'o', template: 't' },
    switches: { yes: 'y' },
  });

  const description = parsed.positionals.join(' ').trim();
  if (description === '') {
    throw new ArgumentError(`Missing description. Usage: ${NEW_USAGE}`);
  }

  await conductInterview(context, {
    start: createSeed('description', description),
    templatePath: parsed.values.get('template') ?? context.config.paths.template,
    outputPath: parsed.values.get('output'),
    outputDir: resolve(context.cwd, context.config.paths.output_dir),
    yes: parsed.switches.has('yes'),
  });
  return { exitCode: 0 };
}
