/**
 * Structured logging.
 *
 * Each entry is one JSON line. The default sink is stderr because stdout
 * carries the interview prompts and the rendered document.
 *
 * @packageDocumentation
 */

/**
 * Severity of an entry.
 *
 * - `debug`: diagnostics, written only in debug mode
 * - `info`: session milestones such as a started session or an applied round
 * - `warn`: problems the session survives, such as a failed hook
 * - `error`: failures that end a session
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  /** ISO 8601. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /** e.g. "Synthesizer", "Hooks". */
  readonly component: string;
  /** snake_case, e.g. "round_applied". */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

/** Receives each serialized line, newline included. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  readonly component: string;
  readonly debugMode?: boolean | undefined;
  /** process.stderr when omitted. */
  readonly sink?: LogSink | undefined;
  /** Entries below this level are dropped; defaults to 'debug'. */
  readonly minLevel?: LogLevel | undefined;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

// Circular or BigInt data cannot be stringified; the entry is kept without it.
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _dropped, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Writes one JSON object per line. stdout stays free for the interview and
 * the rendered document, so the default sink is stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Synthesizer', debugMode: true });
 * logger.info('session_started', { sessionId: 'a1b2c3' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? stderrSink;
    this.minLevel = options.minLevel ?? 'debug';
  }

  /** Same sink and levels, different component name. */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      sink: this.sink,
      minLevel: this.minLevel,
    });
  }

  isDebugEnabled(): boolean {
    return this.debugMode;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    if (this.debugMode) {
      this.log('debug', event, data);
    }
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const base = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data !== undefined ? { ...base, data } : base;

    this.sink(serializeEntry(entry) + '\n');
  }
}

/** Default for callers that pass no logger. */
export const silentLogger = new Logger({
  component: 'silent',
  sink: () => undefined,
});
