/**
 * Document synthesizer: turns a seed into a fully specified document through
 * bounded rounds of clarifying questions.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type { DocumentTemplate } from '../template/types.js';
import { OUTPUT_PATH_TOPIC, findTopic } from '../template/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { freezeState, mergeAnswers } from './answers.js';
import { inspectWorkspace } from './context.js';
import { IncompleteStateError, RoundLimitError } from './errors.js';
import { batchQuestions, iterateOpenQuestions } from './questions.js';
import { renderDocument } from './renderer.js';
import { analyzeSeed, readSeedText } from './seed.js';
import type {
  AnswerRecord,
  DecisionState,
  Fact,
  RenderedDocument,
  RoundResult,
  SeedInput,
} from './types.js';
import { DECISION_STATE_VERSION, createSeed } from './types.js';

/** Default number of rounds before the interview gives up. */
export const DEFAULT_MAX_ROUNDS = 8;

/** Default number of questions shown together. */
export const DEFAULT_MAX_QUESTIONS_PER_BATCH = 4;

/**
 * Options for a DocumentSynthesizer.
 */
export interface SynthesizerOptions {
  readonly template: DocumentTemplate;
  /** Rounds allowed before `nextRound` fails. */
  readonly maxRounds?: number | undefined;
  readonly maxQuestionsPerBatch?: number | undefined;
  /** Workspace inspected for context facts; skipped when absent. */
  readonly workspaceRoot?: string | undefined;
  /** Explicit output path; settles the output path question up front. */
  readonly outputPath?: string | undefined;
  readonly logger?: Logger | undefined;
  /** Clock, replaceable in tests. */
  readonly now?: (() => Date) | undefined;
  /** Session id factory, replaceable in tests. */
  readonly createSessionId?: (() => string) | undefined;
}

/**
 * Runs the synthesis operations against one template.
 *
 * The synthesizer holds configuration only; every state lives in the
 * DecisionState values it returns, so one instance can serve any number of
 * independent sessions.
 *
 * @example
 * ```typescript
 * const synthesizer = new DocumentSynthesizer({ template: await loadTemplate() });
 * let state = await synthesizer.beginSession(createSeed('description', 'rate limiter for login endpoint'));
 * const round = synthesizer.nextRound(state);
 * ```
 */
export class DocumentSynthesizer {
  readonly template: DocumentTemplate;
  readonly maxRounds: number;
  readonly maxQuestionsPerBatch: number;
  private readonly workspaceRoot: string | undefined;
  private readonly outputPath: string | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly createSessionId: () => string;

  constructor(options: SynthesizerOptions) {
    this.template = options.template;
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.maxQuestionsPerBatch = options.maxQuestionsPerBatch ?? DEFAULT_MAX_QUESTIONS_PER_BATCH;
    this.workspaceRoot = options.workspaceRoot;
    this.outputPath = options.outputPath;
    this.logger = (options.logger ?? silentLogger).child('Synthesizer');
    this.now = options.now ?? (() => new Date());
    this.createSessionId = options.createSessionId ?? randomUUID;
  }

  /**
   * Starts a session from a seed.
   *
   * Facts are recorded in this order: seed facts (parsed or inferred),
   * workspace facts, then the explicit output path. A later source never
   * overrides an earlier one, except the explicit output path, which wins
   * over a reference seed's own path.
   *
   * @throws UnresolvableSeedError if the seed cannot be read; no question is
   * produced in that case.
   */
  async beginSession(seed: SeedInput): Promise<DecisionState> {
    const frozenSeed = createSeed(seed.kind, seed.payload);
    const text = await readSeedText(frozenSeed);
    const analysis = analyzeSeed(frozenSeed, text, this.template);

    const values = new Map<string, readonly string[]>(analysis.facts);
    const sources = new Map<string, Fact['source']>(
      [...analysis.facts.keys()].map((key): [string, Fact['source']] => [key, 'seed'])
    );

    if (this.workspaceRoot !== undefined) {
      const context = await inspectWorkspace(this.workspaceRoot, this.template, this.logger);
      for (const [key, contextValues] of context) {
        if (!values.has(key)) {
          values.set(key, contextValues);
          sources.set(key, 'context');
        }
      }
    }

    if (this.outputPath !== undefined && findTopic(this.template, OUTPUT_PATH_TOPIC) !== undefined) {
      values.set(OUTPUT_PATH_TOPIC, [this.outputPath]);
      sources.set(OUTPUT_PATH_TOPIC, 'default');
    }

    const facts: Fact[] = [];
    for (const topic of this.template.topics) {
      const topicValues = values.get(topic.id);
      if (topicValues !== undefined) {
        facts.push({
          key: topic.id,
          values: topicValues,
          source: sources.get(topic.id) ?? 'seed',
          round: 0,
        });
      }
    }

    const timestamp = this.now().toISOString();
    const state = freezeState({
      version: DECISION_STATE_VERSION,
      sessionId: this.createSessionId(),
      seed: frozenSeed,
      title: analysis.title,
      packs: analysis.packs,
      facts,
      round: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    this.logger.info('session_started', {
      sessionId: state.sessionId,
      seedKind: seed.kind,
      title: state.title,
      packs: state.packs,
      knownFacts: facts.length,
    });
    return state;
  }

  /**
   * Produces the next round of questions, or Done when nothing is left.
   *
   * @throws RoundLimitError if the round cap is reached with questions left.
   */
  nextRound(state: DecisionState): RoundResult {
    const questions = [...iterateOpenQuestions(this.template, state)];
    if (questions.length === 0) {
      this.logger.debug('session_done', { sessionId: state.sessionId, rounds: state.round });
      return { done: true, round: state.round };
    }

    if (state.round >= this.maxRounds) {
      this.logger.error('round_limit_exceeded', {
        sessionId: state.sessionId,
        maxRounds: this.maxRounds,
        remaining: questions.map((q) => q.id),
      });
      throw new RoundLimitError(
        this.maxRounds,
        questions.map((q) => q.id)
      );
    }

    const batches = batchQuestions(questions, this.maxQuestionsPerBatch);
    this.logger.debug('round_produced', {
      sessionId: state.sessionId,
      round: state.round + 1,
      questions: questions.length,
      batches: batches.length,
    });
    return { done: false, round: state.round + 1, questions, batches };
  }

  /**
   * Validates answers and returns a new state containing them.
   *
   * @throws InvalidAnswerError if any answer is rejected; nothing is merged.
   */
  applyAnswers(state: DecisionState, answers: AnswerRecord): DecisionState {
    const next = mergeAnswers(this.template, state, answers, this.now);
    this.logger.info('answers_applied', {
      sessionId: next.sessionId,
      round: next.round,
      answered: Object.keys(answers).length,
    });
    return next;
  }

  /**
   * Renders a completed state.
   *
   * @throws IncompleteStateError if any applicable field is unresolved.
   */
  render(state: DecisionState): RenderedDocument {
    try {
      return renderDocument(state, this.template);
    } catch (error) {
      if (error instanceof IncompleteStateError) {
        this.logger.error('incomplete_state', {
          sessionId: state.sessionId,
          unresolved: error.unresolved,
        });
      }
      throw error;
    }
  }
}

/**
 * Starts a session. See {@link DocumentSynthesizer.beginSession}.
 */
export function beginSession(
  seed: SeedInput,
  options: SynthesizerOptions
): Promise<DecisionState> {
  return new DocumentSynthesizer(options).beginSession(seed);
}

/**
 * Produces the next round. See {@link DocumentSynthesizer.nextRound}.
 */
export function nextRound(state: DecisionState, options: SynthesizerOptions): RoundResult {
  return new DocumentSynthesizer(options).nextRound(state);
}

/**
 * Merges answers. See {@link DocumentSynthesizer.applyAnswers}.
 */
export function applyAnswers(
  state: DecisionState,
  answers: AnswerRecord,
  template: DocumentTemplate
): DecisionState {
  return mergeAnswers(template, state, answers);
}

/**
 * Renders a completed state. See {@link DocumentSynthesizer.render}.
 */
export function render(state: DecisionState, template: DocumentTemplate): RenderedDocument {
  return renderDocument(state, template);
}
