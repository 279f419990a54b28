#!/usr/bin/env node

/**
 * clarion CLI entry point.
 */

import { createCliApp } from './app.js';
import { EDIT_USAGE, handleEditCommand } from './commands/edit.js';
import { NEW_USAGE, handleNewCommand } from './commands/new.js';
import { RESUME_USAGE, handleResumeCommand } from './commands/resume.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler } from './types.js';
import { runCommand, withErrorHandling } from './utils/errorHandling.js';

/**
 * Displays usage information.
 */
function showHelp(): void {
  const helpText = `
clarion v${getVersionFromPackageJson()}

Interview-driven document synthesis: answer a few rounds of questions,
get a complete specification document.

USAGE:
  clarion <command> [options]

COMMANDS:
  new         Start an interview from a description
  edit        Revise a document clarion wrote earlier
  resume      Continue an unfinished session, or list them
  help        Show this help message
  version     Show version information

OPTIONS:
  --config, -c <path>  Use this configuration file instead of ./clarion.toml
  --help, -h           Show help for a command
  --version, -v        Show version information

EXAMPLES:
  clarion new rate limiter for login endpoint
  clarion new "weekly report export" --output docs/report.md --yes
  clarion edit docs/specs/rate-limiter-for-login-endpoint.md
  clarion resume
`;
  process.stdout.write(helpText);
}

const COMMAND_HELP: ReadonlyMap<string, string> = new Map(Object.entries({
  new: `
USAGE: ${NEW_USAGE}

Starts an interview from a free-text description and writes the resulting
document. The description does not need quotes.

OPTIONS:
  --output, -o <path>    Write the document here instead of asking
  --template, -t <path>  Use this template instead of the configured one
  --yes, -y              Accept every recommended option without prompting

EXAMPLES:
  clarion new rate limiter for login endpoint
  clarion new "nightly cleanup job" --yes
`,
  edit: `
USAGE: ${EDIT_USAGE}

Reads a document clarion wrote earlier, asks only what is still open or
new, and rewrites the document in place.

OPTIONS:
  --template, -t <path>  Use this template instead of the configured one
  --yes, -y              Accept every recommended option without prompting

EXAMPLES:
  clarion edit docs/specs/rate-limiter-for-login-endpoint.md
`,
  resume: `
USAGE: ${RESUME_USAGE}

Continues a session that was quit before its document was written. Without
a session id, lists the sessions that can be resumed.

OPTIONS:
  --yes, -y              Accept every recommended option without prompting

EXAMPLES:
  clarion resume
  clarion resume 3f2a9c1e-0b7d-4e55-9a61-2c8f4d7e1b90
`,
}));

/**
 * Shows help for a specific command.
 */
function showHelpForCommand(commandName: string): void {
  const help = COMMAND_HELP.get(commandName);
  if (help !== undefined) {
    process.stdout.write(help);
  } else {
    process.stderr.write(`Unknown command: ${commandName}\n`);
    process.stderr.write('\nRun "clarion help" to see all available commands.\n');
  }
}

/**
 * Shows error message with help.
 */
function showError(message: string): void {
  process.stderr.write(`Error: ${message}\n`);
  process.stderr.write('\nRun "clarion help" for usage information.\n');
}

/**
 * Runs a command with a fully configured context.
 */
function runWithContext(handler: CliCommandHandler, args: string[]): void {
  withErrorHandling(async () => {
    const context = await createCliApp({ args });
    return runCommand(handler, context);
  });
}

const COMMANDS: ReadonlyMap<string, CliCommandHandler> = new Map([
  ['new', handleNewCommand],
  ['edit', handleEditCommand],
  ['resume', handleResumeCommand],
]);

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    default: {
      const handler = COMMANDS.get(command);
      if (handler === undefined) {
        showError(`Unknown command: ${command}`);
        process.exit(1);
      }
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelpForCommand(command);
        process.exit(0);
      }
      runWithContext(handler, commandArgs);
    }
  }
}

try {
  main();
} catch (error) {
  process.stderr.write(
    `Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`
  );
  if (error instanceof Error && error.stack !== undefined) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exit(1);
}
