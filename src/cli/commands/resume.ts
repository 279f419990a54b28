/**
 * `clarion resume`: continue an unfinished session, or list the sessions
 * that can be resumed.
 */

import { SessionPersistenceError, type SessionRecord } from '../../synthesis/persistence.js';
import { terminalStyles } from '../styles.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { ArgumentError, parseArgs } from '../utils/args.js';
import { conductInterview, openSessionStore } from './interview.js';

export const RESUME_USAGE = 'clarion resume [<session-id>] [--yes]';

/**
 * Prints every session that is not completed.
 */
async function listResumable(context: CliContext): Promise<CliCommandResult> {
  const store = openSessionStore(context);
  const s = terminalStyles(context.display);
  const lines: string[] = [];

  for (const id of await store.list()) {
    let record: SessionRecord;
    try {
      record = await store.load(id);
    } catch (error) {
      if (error instanceof SessionPersistenceError) {
        lines.push(`  ${id}  ${s.red}unreadable${s.reset}  ${error.message}`);
        continue;
      }
      throw error;
    }
    if (record.status !== 'completed') {
      lines.push(
        `  ${id}  ${record.status}  ${record.state.title} ${s.dim}(round ${String(record.state.round)})${s.reset}`
      );
    }
  }

  if (lines.length === 0) {
    context.stdout('No sessions to resume.\n');
  } else {
    context.stdout(`Sessions to resume:\n${lines.join('\n')}\n`);
  }
  return { exitCode: 0 };
}

/**
 * Handles the resume command.
 */
export async function handleResumeCommand(context: CliContext): Promise<CliCommandResult> {
  const parsed = parseArgs(context.args, { switches: { yes: 'y' } });
  const [sessionId, ...extra] = parsed.positionals;
  if (extra.length > 0) {
    throw new ArgumentError(`Expected at most one session id. Usage: ${RESUME_USAGE}`);
  }
  if (sessionId === undefined) {
    return listResumable(context);
  }

  const record = await openSessionStore(context).load(sessionId);
  if (record.status === 'completed') {
    return { exitCode: 1, message: `Session "${sessionId}" is already completed` };
  }

  context.logger.info('session_resumed', { sessionId, round: record.state.round });
  await conductInterview(context, {
    start: record.state,
    templatePath: record.templatePath,
    outputDir: record.outputDir ?? context.cwd,
    yes: parsed.switches.has('yes'),
  });
  return { exitCode: 0 };
}
