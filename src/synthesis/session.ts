/**
 * The interview loop: ask rounds until nothing is open, then render and
 * write the document.
 *
 * @packageDocumentation
 */

import { resolve } from 'node:path';
import { OUTPUT_PATH_TOPIC } from '../template/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { safeWriteTextFileAtomic } from '../utils/safe-fs.js';
import {
  AbandonedSessionError,
  IncompleteStateError,
  InvalidAnswerError,
  type ValidationDetail,
} from './errors.js';
import type { SessionStatus, SessionStore } from './persistence.js';
import type { DocumentSynthesizer } from './synthesizer.js';
import type {
  AnswerRecord,
  DecisionState,
  QuestionBatch,
  RenderedDocument,
  SeedInput,
} from './types.js';

/**
 * Where a batch sits within its round.
 */
export interface BatchContext {
  readonly sessionId: string;
  readonly title: string;
  readonly round: number;
  /** 0-based index of the batch within the round. */
  readonly batchIndex: number;
  readonly batchCount: number;
}

/**
 * Supplies answers for question batches.
 *
 * Returning `null` declines to continue and abandons the session.
 */
export interface Answerer {
  answer(batch: QuestionBatch, context: BatchContext): Promise<AnswerRecord | null>;
}

/**
 * Details passed to session hooks.
 */
export interface SessionEvent {
  readonly sessionId: string;
  readonly title: string;
  /** Absolute path of the written document; undefined on abandonment. */
  readonly outputPath: string | undefined;
}

/**
 * Callbacks fired when a session ends.
 */
export interface SessionHooks {
  onComplete?(event: SessionEvent): Promise<void>;
  onAbandon?(event: SessionEvent): Promise<void>;
}

/**
 * Options for running a session.
 */
export interface RunSessionOptions {
  readonly answerer: Answerer;
  /** Directory relative output paths are resolved against. Defaults to the working directory. */
  readonly outputDir?: string | undefined;
  /** Persists state after every round when given. */
  readonly store?: SessionStore | undefined;
  /** Recorded with persisted sessions so `resume` can reload the same template. */
  readonly templatePath?: string | undefined;
  readonly hooks?: SessionHooks | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Outcome of a completed session.
 */
export interface SessionResult {
  readonly state: DecisionState;
  readonly document: RenderedDocument;
  /** Absolute path the document was written to. */
  readonly outputPath: string;
}

class SessionRunner {
  private readonly logger: Logger;

  constructor(
    private readonly synthesizer: DocumentSynthesizer,
    private readonly options: RunSessionOptions
  ) {
    this.logger = (options.logger ?? silentLogger).child('Session');
  }

  async run(initial: DecisionState): Promise<SessionResult> {
    let state = initial;
    await this.persist(state, 'active');

    for (;;) {
      const round = this.synthesizer.nextRound(state);
      if (round.done) {
        break;
      }

      await this.transcript(state.sessionId, round.round, 'questions', {
        round: round.round,
        questions: round.questions.map((q) => q.id),
      });

      const answers: Record<string, readonly string[]> = {};
      for (const [batchIndex, batch] of round.batches.entries()) {
        const batchAnswers = await this.options.answerer.answer(batch, {
          sessionId: state.sessionId,
          title: state.title,
          round: round.round,
          batchIndex,
          batchCount: round.batches.length,
        });
        if (batchAnswers === null) {
          await this.abandon(state, round.round);
        } else {
          assertBatchAnswered(batch, batchAnswers);
          Object.assign(answers, batchAnswers);
        }
      }

      state = this.synthesizer.applyAnswers(state, answers);
      await this.transcript(state.sessionId, state.round, 'answers', { answers });
      await this.persist(state, 'active');
    }

    const document = this.synthesizer.render(state);
    if (document.outputPath === undefined) {
      throw new IncompleteStateError([OUTPUT_PATH_TOPIC]);
    }
    const outputPath = resolve(this.options.outputDir ?? process.cwd(), document.outputPath);

    await safeWriteTextFileAtomic(outputPath, document.text, state.sessionId);
    this.logger.info('document_written', { sessionId: state.sessionId, outputPath });

    await this.persist(state, 'completed');
    await this.transcript(state.sessionId, state.round, 'completed', { outputPath });
    await this.options.hooks?.onComplete?.({
      sessionId: state.sessionId,
      title: state.title,
      outputPath,
    });

    return { state, document, outputPath };
  }

  private async abandon(state: DecisionState, round: number): Promise<never> {
    this.logger.warn('session_abandoned', { sessionId: state.sessionId, round });
    await this.persist(state, 'abandoned');
    await this.transcript(state.sessionId, round, 'abandoned', { round });
    await this.options.hooks?.onAbandon?.({
      sessionId: state.sessionId,
      title: state.title,
      outputPath: undefined,
    });
    throw new AbandonedSessionError(state.sessionId, round);
  }

  private async persist(state: DecisionState, status: SessionStatus): Promise<void> {
    await this.options.store?.save({
      status,
      templatePath: this.options.templatePath,
      outputDir: this.options.outputDir,
      state,
    });
  }

  private async transcript(
    sessionId: string,
    round: number,
    event: 'questions' | 'answers' | 'completed' | 'abandoned',
    payload: Record<string, unknown>
  ): Promise<void> {
    await this.options.store?.appendTranscript(sessionId, {
      timestamp: new Date().toISOString(),
      round,
      event,
      payload,
    });
  }
}

/**
 * Rejects batch answers that leave a question out or answer a question from
 * another batch.
 */
function assertBatchAnswered(batch: QuestionBatch, answers: AnswerRecord): void {
  const details: ValidationDetail[] = [];
  const ids = new Set(batch.questions.map((q) => q.id));
  for (const question of batch.questions) {
    if (!(question.id in answers)) {
      details.push({ field: question.id, message: 'Question was not answered' });
    }
  }
  for (const field of Object.keys(answers)) {
    if (!ids.has(field)) {
      details.push({ field, message: 'Question is not part of this batch' });
    }
  }
  if (details.length > 0) {
    throw new InvalidAnswerError(details);
  }
}

/**
 * Runs an interview to completion.
 *
 * Starting from a seed begins a new session; starting from a state continues
 * an earlier one. Every round is persisted when a store is given. Declining a
 * batch abandons the session without writing a document.
 *
 * @throws UnresolvableSeedError if the seed cannot be read.
 * @throws AbandonedSessionError if the answerer declines.
 * @throws RoundLimitError if the round cap is reached.
 * @throws IncompleteStateError if rendering finds unresolved fields.
 */
export async function runSession(
  synthesizer: DocumentSynthesizer,
  start: SeedInput | DecisionState,
  options: RunSessionOptions
): Promise<SessionResult> {
  const state = 'sessionId' in start ? start : await synthesizer.beginSession(start);
  return new SessionRunner(synthesizer, options).run(state);
}
