/**
 * Error taxonomy for synthesis sessions.
 *
 * @packageDocumentation
 */

/**
 * Error codes for synthesis failures.
 */
export type SynthesisErrorCode =
  | 'UNRESOLVABLE_SEED'
  | 'INCOMPLETE_STATE'
  | 'ABANDONED_SESSION'
  | 'INVALID_ANSWER'
  | 'ROUND_LIMIT_EXCEEDED';

/**
 * A single answer validation problem.
 */
export interface ValidationDetail {
  /** Question id the problem concerns. */
  readonly field: string;
  readonly message: string;
  /** Offending value, when there is one. */
  readonly received?: string | undefined;
}

/**
 * Base class for every failure that terminates a session.
 */
export class SynthesisError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: SynthesisErrorCode;
  /** The underlying cause if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new SynthesisError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, code: SynthesisErrorCode, cause?: Error) {
    super(message);
    this.name = 'SynthesisError';
    this.code = code;
    this.cause = cause;
  }
}

/**
 * The seed could not be resolved; the session never starts.
 */
export class UnresolvableSeedError extends SynthesisError {
  /** Referenced path, for reference seeds. */
  public readonly seedPath: string | undefined;

  constructor(message: string, options?: { seedPath?: string | undefined; cause?: Error | undefined }) {
    super(message, 'UNRESOLVABLE_SEED', options?.cause);
    this.name = 'UnresolvableSeedError';
    this.seedPath = options?.seedPath;
  }
}

/**
 * Rendering was attempted while applicable fields were still unresolved.
 */
export class IncompleteStateError extends SynthesisError {
  /** Topic ids without a usable fact. */
  public readonly unresolved: readonly string[];

  constructor(unresolved: readonly string[]) {
    super(
      `Cannot render document: unresolved fields ${unresolved.join(', ')}`,
      'INCOMPLETE_STATE'
    );
    this.name = 'IncompleteStateError';
    this.unresolved = unresolved;
  }
}

/**
 * The answerer declined to continue. No document is written.
 */
export class AbandonedSessionError extends SynthesisError {
  public readonly sessionId: string;
  /** Round that was being asked when the session was abandoned. */
  public readonly round: number;

  constructor(sessionId: string, round: number) {
    super(`Session ${sessionId} abandoned during round ${String(round)}`, 'ABANDONED_SESSION');
    this.name = 'AbandonedSessionError';
    this.sessionId = sessionId;
    this.round = round;
  }
}

/**
 * Answers failed validation; the state is left unchanged.
 */
export class InvalidAnswerError extends SynthesisError {
  public readonly validationDetails: readonly ValidationDetail[];

  constructor(validationDetails: readonly ValidationDetail[]) {
    const summary = validationDetails.map((d) => `${d.field}: ${d.message}`).join('; ');
    super(`Invalid answers: ${summary}`, 'INVALID_ANSWER');
    this.name = 'InvalidAnswerError';
    this.validationDetails = validationDetails;
  }
}

/**
 * The configured number of rounds was used up while questions remained.
 */
export class RoundLimitError extends SynthesisError {
  public readonly maxRounds: number;
  /** Topic ids still open. */
  public readonly remaining: readonly string[];

  constructor(maxRounds: number, remaining: readonly string[]) {
    super(
      `Round limit of ${String(maxRounds)} reached with ${String(remaining.length)} open question(s): ${remaining.join(', ')}`,
      'ROUND_LIMIT_EXCEEDED'
    );
    this.name = 'RoundLimitError';
    this.maxRounds = maxRounds;
    this.remaining = remaining;
  }
}
