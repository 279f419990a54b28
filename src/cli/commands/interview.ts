/**
 * Shared interview runner behind the `new`, `edit` and `resume` commands.
 */

import { resolve } from 'node:path';
import { DocumentSynthesizer } from '../../synthesis/synthesizer.js';
import { SessionStore } from '../../synthesis/persistence.js';
import { runSession, type Answerer, type SessionResult } from '../../synthesis/session.js';
import type { DecisionState, SeedInput } from '../../synthesis/types.js';
import { loadTemplate } from '../../template/loader.js';
import { SessionHooksExecutor } from '../hooks.js';
import { AutoAnswerer, TerminalAnswerer } from '../prompt.js';
import { terminalStyles } from '../styles.js';
import type { CliContext, InputReader } from '../types.js';

/**
 * What to interview about and where the result goes.
 */
export interface InterviewOptions {
  /** A seed for a new session, or the state of one being resumed. */
  readonly start: SeedInput | DecisionState;
  /** Template file; the configured or bundled template when undefined. */
  readonly templatePath: string | undefined;
  /** Explicit output path, settling the output question up front. */
  readonly outputPath?: string | undefined;
  /** Directory relative output paths are resolved against. */
  readonly outputDir: string;
  /** Accept recommended options instead of prompting. */
  readonly yes: boolean;
}

/**
 * Session store rooted at the configured sessions directory.
 */
export function openSessionStore(context: CliContext): SessionStore {
  return new SessionStore(resolve(context.cwd, context.config.paths.sessions));
}

/**
 * Runs an interview to completion and reports the written document.
 *
 * @throws Whatever the session raises; the caller reports it.
 */
export async function conductInterview(
  context: CliContext,
  options: InterviewOptions
): Promise<SessionResult> {
  const { config, logger } = context;
  const templatePath =
    options.templatePath !== undefined ? resolve(context.cwd, options.templatePath) : undefined;
  const template = await loadTemplate(templatePath);

  const synthesizer = new DocumentSynthesizer({
    template,
    maxRounds: config.interview.max_rounds,
    maxQuestionsPerBatch: config.interview.max_questions_per_batch,
    workspaceRoot: context.cwd,
    outputPath: options.outputPath,
    logger,
  });

  let reader: InputReader | undefined;
  let answerer: Answerer;
  if (options.yes) {
    answerer = new AutoAnswerer(context.stdout, context.display);
  } else {
    reader = context.createReader();
    answerer = new TerminalAnswerer(reader, context.stdout, context.display);
  }

  try {
    const result = await runSession(synthesizer, options.start, {
      answerer,
      outputDir: options.outputDir,
      store: openSessionStore(context),
      templatePath,
      hooks: new SessionHooksExecutor(config.hooks, context.cwd, logger),
      logger,
    });
    const s = terminalStyles(context.display);
    context.stdout(`\n${s.green}Wrote${s.reset} ${result.outputPath}\n`);
    return result;
  } finally {
    reader?.close();
  }
}
