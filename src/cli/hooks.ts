/**
 * Session hook execution.
 *
 * Runs the shell commands configured under `[hooks]` when a session
 * completes or is abandoned.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { HooksConfig, SessionHookConfig } from '../config/types.js';
import type { SessionEvent, SessionHooks } from '../synthesis/session.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Variables available for substitution in hook commands.
 */
export interface HookVariables {
  /** Absolute path of the written document. */
  path?: string | undefined;
  /** Document title. */
  title?: string | undefined;
  /** Session id. */
  session?: string | undefined;
}

/**
 * Quotes a value for POSIX `sh`.
 */
export function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Substitutes `{path}`, `{title}` and `{session}`. Values are shell-quoted;
 * placeholders without a value are left as they are.
 */
export function substituteVariables(command: string, variables: HookVariables): string {
  return command.replace(/\{(path|title|session)\}/g, (placeholder, name: string) => {
    const value =
      name === 'path' ? variables.path : name === 'title' ? variables.title : variables.session;
    return value === undefined ? placeholder : quoteShellArg(value);
  });
}

/**
 * Runs configured hooks; implements the session's hook callbacks.
 *
 * A failing hook is logged and never fails the session.
 */
export class SessionHooksExecutor implements SessionHooks {
  private readonly hooks: HooksConfig;
  private readonly cwd: string;
  private readonly logger: Logger;

  /**
   * @param hooks - Hook configuration.
   * @param cwd - Working directory for commands. Default: process.cwd().
   */
  constructor(hooks: HooksConfig, cwd?: string, logger?: Logger) {
    this.hooks = hooks;
    this.cwd = cwd ?? process.cwd();
    this.logger = (logger ?? silentLogger).child('Hooks');
  }

  async onComplete(event: SessionEvent): Promise<void> {
    await this.execute('on_complete', this.hooks.on_complete, event);
  }

  async onAbandon(event: SessionEvent): Promise<void> {
    await this.execute('on_abandon', this.hooks.on_abandon, event);
  }

  /** Failures are logged at warn level and never thrown. */
  private async execute(
    name: string,
    hook: SessionHookConfig | undefined,
    event: SessionEvent
  ): Promise<void> {
    if (hook?.enabled !== true) {
      return;
    }

    const command = substituteVariables(hook.command, {
      path: event.outputPath,
      title: event.title,
      session: event.sessionId,
    });

    const result = await execa('sh', ['-c', command], {
      cwd: this.cwd,
      reject: false,
      timeout: 5000,
    });

    if (result.failed) {
      this.logger.warn('hook_failed', {
        hook: name,
        command,
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
      return;
    }
    this.logger.debug('hook_executed', { hook: name, command });
  }
}
