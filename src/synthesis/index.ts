/**
 * Interview-driven document synthesis.
 *
 * @packageDocumentation
 */

export type {
  AnswerRecord,
  DecisionState,
  Done,
  Fact,
  FactSource,
  Question,
  QuestionBatch,
  QuestionOption,
  RenderedDocument,
  RenderedSection,
  Round,
  RoundResult,
  SeedInput,
  SeedKind,
} from './types.js';
export { DECISION_STATE_VERSION, createSeed, isFactSource, isSeedKind } from './types.js';

export {
  AbandonedSessionError,
  IncompleteStateError,
  InvalidAnswerError,
  RoundLimitError,
  SynthesisError,
  UnresolvableSeedError,
} from './errors.js';
export type { SynthesisErrorCode, ValidationDetail } from './errors.js';

export {
  DEFAULT_MAX_QUESTIONS_PER_BATCH,
  DEFAULT_MAX_ROUNDS,
  DocumentSynthesizer,
  applyAnswers,
  beginSession,
  nextRound,
  render,
} from './synthesizer.js';
export type { SynthesizerOptions } from './synthesizer.js';

export { validateAnswers } from './answers.js';
export { applicableTopics, batchQuestions, iterateOpenQuestions, topicStatus } from './questions.js';
export type { TopicStatus } from './questions.js';
export { findUnresolved } from './renderer.js';
export { analyzeSeed, detectPacks, inferFacts, parseRenderedDocument } from './seed.js';
export type { ParsedDocument, SeedAnalysis } from './seed.js';
export { TEST_FRAMEWORK_TOPIC, inspectWorkspace } from './context.js';
export { AMBIGUOUS_VALUES, deriveTitle, isAmbiguousValue, slugify } from './values.js';

export { runSession } from './session.js';
export type {
  Answerer,
  BatchContext,
  RunSessionOptions,
  SessionEvent,
  SessionHooks,
  SessionResult,
} from './session.js';

export { SessionPersistenceError, SessionStore } from './persistence.js';
export type {
  SessionPersistenceErrorType,
  SessionRecord,
  SessionStatus,
  TranscriptEntry,
  TranscriptEvent,
} from './persistence.js';
