/**
 * Type definitions for document synthesis sessions.
 *
 * @packageDocumentation
 */

import type { SectionId } from '../template/types.js';

/**
 * Current version of the DecisionState shape. Bumped whenever a persisted
 * state can no longer be read by the current code.
 */
export const DECISION_STATE_VERSION = '1.0.0';

/**
 * How a seed was supplied.
 *
 * - `reference`: path of an existing document
 * - `description`: free text describing the work
 */
export type SeedKind = 'reference' | 'description';

/**
 * The request a session starts from.
 */
export interface SeedInput {
  readonly kind: SeedKind;
  /** File path for references, the description text otherwise. */
  readonly payload: string;
}

/**
 * One candidate answer of a question.
 */
export interface QuestionOption {
  readonly label: string;
  readonly description: string;
  readonly isRecommended: boolean;
}

/**
 * A clarifying question for one unresolved topic.
 */
export interface Question {
  /** Question identifier; answers are keyed by it. */
  readonly id: string;
  /** Template topic the answer resolves. */
  readonly topicId: string;
  /** Batch the question is presented in. */
  readonly group: string;
  readonly text: string;
  readonly options: readonly QuestionOption[];
  readonly allowMultiple: boolean;
  readonly allowCustom: boolean;
}

/**
 * Answers for one round, keyed by question id.
 */
export type AnswerRecord = Readonly<Record<string, readonly string[]>>;

/**
 * Where a fact came from.
 *
 * - `seed`: parsed or inferred from the seed
 * - `context`: inferred from the target workspace
 * - `answer`: supplied in an interview round
 * - `default`: supplied by the caller up front (an explicit output path)
 */
export type FactSource = 'seed' | 'context' | 'answer' | 'default';

/**
 * All fact sources.
 */
export const FACT_SOURCES: readonly FactSource[] = ['seed', 'context', 'answer', 'default'] as const;

/**
 * A settled decision.
 */
export interface Fact {
  /** Template topic id. */
  readonly key: string;
  readonly values: readonly string[];
  readonly source: FactSource;
  /** Round the fact was recorded in; 0 for facts known before the interview. */
  readonly round: number;
}

/**
 * Accumulated decisions of a session.
 *
 * States are immutable: `beginSession` creates the first one and every
 * `applyAnswers` returns a new state whose facts extend the previous ones.
 */
export interface DecisionState {
  readonly version: string;
  readonly sessionId: string;
  readonly seed: SeedInput;
  /** Document title. */
  readonly title: string;
  /** Ids of the topic packs switched on by the seed. */
  readonly packs: readonly string[];
  readonly facts: readonly Fact[];
  /** Number of interview rounds answered so far. */
  readonly round: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Questions of one group, presented together.
 */
export interface QuestionBatch {
  readonly group: string;
  readonly questions: readonly Question[];
}

/**
 * A round with questions still to answer.
 */
export interface Round {
  readonly done: false;
  /** Number of the round being asked (1-based). */
  readonly round: number;
  readonly questions: readonly Question[];
  readonly batches: readonly QuestionBatch[];
}

/**
 * Marker returned once nothing remains to ask.
 */
export interface Done {
  readonly done: true;
  /** Rounds answered before completion. */
  readonly round: number;
}

/**
 * Result of `nextRound`.
 */
export type RoundResult = Round | Done;

/**
 * A rendered section.
 */
export interface RenderedSection {
  readonly id: SectionId;
  readonly heading: string;
  /** Markdown body lines, without the heading. */
  readonly lines: readonly string[];
}

/**
 * The final document.
 */
export interface RenderedDocument {
  readonly title: string;
  /** Output path taken from the `output.path` fact, if the template asks for one. */
  readonly outputPath: string | undefined;
  readonly sections: readonly RenderedSection[];
  /** Full Markdown text, ending with a newline. */
  readonly text: string;
}

/**
 * Checks whether a value is a valid SeedKind.
 */
export function isSeedKind(value: unknown): value is SeedKind {
  return value === 'reference' || value === 'description';
}

/**
 * Checks whether a value is a valid FactSource.
 */
export function isFactSource(value: unknown): value is FactSource {
  return typeof value === 'string' && (FACT_SOURCES as readonly string[]).includes(value);
}

/**
 * Creates a frozen seed.
 */
export function createSeed(kind: SeedKind, payload: string): SeedInput {
  return Object.freeze({ kind, payload });
}
