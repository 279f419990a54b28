/**
 * Session persistence.
 *
 * Each session lives in its own directory under the sessions root:
 * `state.json` holds the latest DecisionState (written atomically after every
 * round) and `transcript.jsonl` records what was asked and answered.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import {
  isNotFoundError,
  safeAppendTextFile,
  safeExists,
  safeMkdir,
  safeReadTextFile,
  safeReaddir,
  safeWriteTextFileAtomic,
} from '../utils/safe-fs.js';
import { freezeState } from './answers.js';
import type { DecisionState, Fact } from './types.js';
import { DECISION_STATE_VERSION, isFactSource, isSeedKind } from './types.js';

/**
 * Error type for persistence operations.
 */
export type SessionPersistenceErrorType =
  | 'parse_error'
  | 'schema_error'
  | 'file_error'
  | 'validation_error'
  | 'corruption_error'
  | 'not_found';

/**
 * Error class for session persistence failures.
 */
export class SessionPersistenceError extends Error {
  /** The type of persistence error. */
  public readonly errorType: SessionPersistenceErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new SessionPersistenceError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of persistence error.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: SessionPersistenceErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'SessionPersistenceError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Lifecycle status of a persisted session.
 */
export type SessionStatus = 'active' | 'completed' | 'abandoned';

const SESSION_STATUSES: readonly SessionStatus[] = ['active', 'completed', 'abandoned'];

/**
 * What is stored in `state.json`.
 */
export interface SessionRecord {
  readonly status: SessionStatus;
  /** Template the session was started with; undefined for the bundled one. */
  readonly templatePath: string | undefined;
  /** Directory relative output paths are resolved against. */
  readonly outputDir: string | undefined;
  readonly state: DecisionState;
}

/**
 * Kind of transcript entry.
 */
export type TranscriptEvent = 'questions' | 'answers' | 'completed' | 'abandoned';

/**
 * A line of `transcript.jsonl`.
 */
export interface TranscriptEntry {
  readonly timestamp: string;
  readonly round: number;
  readonly event: TranscriptEvent;
  readonly payload: Record<string, unknown>;
}

const TRANSCRIPT_EVENTS: readonly TranscriptEvent[] = [
  'questions',
  'answers',
  'completed',
  'abandoned',
];

/** Session ids become directory names. */
const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function schemaError(message: string): SessionPersistenceError {
  return new SessionPersistenceError(`Invalid session record: ${message}`, 'schema_error');
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw schemaError(`${field} must be a string`);
  }
  return value;
}

function requireCount(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw schemaError(`${field} must be a non-negative integer`);
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  return value === undefined ? undefined : requireString(value, field);
}

function requireStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw schemaError(`${field} must be an array`);
  }
  return value.map((item: unknown, index) => requireString(item, `${field}[${String(index)}]`));
}

function deserializeFact(value: unknown, index: number): Fact {
  const field = `state.facts[${String(index)}]`;
  if (!isRecord(value)) {
    throw schemaError(`${field} must be an object`);
  }
  if (!isFactSource(value.source)) {
    throw schemaError(`${field}.source is not a valid fact source`);
  }
  return {
    key: requireString(value.key, `${field}.key`),
    values: requireStringArray(value.values, `${field}.values`),
    source: value.source,
    round: requireCount(value.round, `${field}.round`),
  };
}

function deserializeState(value: unknown): DecisionState {
  if (!isRecord(value)) {
    throw schemaError('state must be an object');
  }
  const version = requireString(value.version, 'state.version');
  if (version !== DECISION_STATE_VERSION) {
    throw new SessionPersistenceError(
      `Unsupported session state version "${version}"`,
      'validation_error',
      { details: `Expected version ${DECISION_STATE_VERSION}` }
    );
  }
  const seed = value.seed;
  if (!isRecord(seed) || !isSeedKind(seed.kind)) {
    throw schemaError('state.seed must have a kind of "reference" or "description"');
  }
  if (!Array.isArray(value.facts)) {
    throw schemaError('state.facts must be an array');
  }

  const facts = value.facts.map((fact: unknown, index) => deserializeFact(fact, index));
  const keys = new Set<string>();
  for (const fact of facts) {
    if (keys.has(fact.key)) {
      throw schemaError(`duplicate fact "${fact.key}"`);
    }
    keys.add(fact.key);
  }

  return freezeState({
    version,
    sessionId: requireString(value.sessionId, 'state.sessionId'),
    seed: { kind: seed.kind, payload: requireString(seed.payload, 'state.seed.payload') },
    title: requireString(value.title, 'state.title'),
    packs: requireStringArray(value.packs, 'state.packs'),
    facts,
    round: requireCount(value.round, 'state.round'),
    createdAt: requireString(value.createdAt, 'state.createdAt'),
    updatedAt: requireString(value.updatedAt, 'state.updatedAt'),
  });
}

/**
 * Serializes a session record to JSON.
 */
export function serializeSessionRecord(record: SessionRecord): string {
  return JSON.stringify(record, null, 2);
}

/**
 * Parses and validates a session record.
 *
 * @throws SessionPersistenceError with `parse_error` for invalid JSON and
 * `schema_error` or `validation_error` for a malformed record.
 */
export function deserializeSessionRecord(json: string): SessionRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SessionPersistenceError(
      `Failed to parse session record: ${cause.message}`,
      'parse_error',
      { cause }
    );
  }
  if (!isRecord(parsed)) {
    throw schemaError('expected an object');
  }

  const rawStatus = parsed.status;
  const knownStatus = SESSION_STATUSES.find((s) => s === rawStatus);
  if (knownStatus === undefined) {
    throw schemaError(`status must be one of ${SESSION_STATUSES.join(', ')}`);
  }

  return {
    status: knownStatus,
    templatePath: optionalString(parsed.templatePath, 'templatePath'),
    outputDir: optionalString(parsed.outputDir, 'outputDir'),
    state: deserializeState(parsed.state),
  };
}

/**
 * Parses one transcript line.
 *
 * @param lineNumber - 1-based line number for error messages.
 */
export function deserializeTranscriptEntry(line: string, lineNumber: number): TranscriptEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SessionPersistenceError(
      `Failed to parse transcript line ${String(lineNumber)}: ${cause.message}`,
      'parse_error',
      { cause }
    );
  }
  const rawEvent = isRecord(parsed) ? parsed.event : undefined;
  const event = TRANSCRIPT_EVENTS.find((e) => e === rawEvent);
  if (!isRecord(parsed) || event === undefined || !isRecord(parsed.payload)) {
    throw new SessionPersistenceError(
      `Invalid transcript entry on line ${String(lineNumber)}`,
      'schema_error'
    );
  }
  return {
    timestamp: requireString(parsed.timestamp, 'timestamp'),
    round: requireCount(parsed.round, 'round'),
    event,
    payload: parsed.payload,
  };
}

/**
 * File-backed store of sessions.
 *
 * @example
 * ```typescript
 * const store = new SessionStore('.clarion/sessions');
 * await store.save({ status: 'active', templatePath: undefined, outputDir: undefined, state });
 * const record = await store.load(state.sessionId);
 * ```
 */
export class SessionStore {
  /** Root directory holding one directory per session. */
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  /**
   * Directory of a session.
   *
   * @throws SessionPersistenceError if the id is not a safe directory name.
   */
  sessionDir(sessionId: string): string {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new SessionPersistenceError(
        `Invalid session id "${sessionId}"`,
        'validation_error',
        { details: 'Session ids contain only letters, digits, "-" and "_"' }
      );
    }
    return join(this.root, sessionId);
  }

  statePath(sessionId: string): string {
    return join(this.sessionDir(sessionId), 'state.json');
  }

  transcriptPath(sessionId: string): string {
    return join(this.sessionDir(sessionId), 'transcript.jsonl');
  }

  /**
   * Writes a session record atomically, replacing any previous one.
   */
  async save(record: SessionRecord): Promise<void> {
    const path = this.statePath(record.state.sessionId);
    try {
      await safeWriteTextFileAtomic(path, serializeSessionRecord(record), randomUUID());
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new SessionPersistenceError(
        `Failed to save session "${record.state.sessionId}": ${cause.message}`,
        'file_error',
        { cause }
      );
    }
  }

  /**
   * Loads a session record.
   *
   * @throws SessionPersistenceError with `not_found` when no session exists.
   */
  async load(sessionId: string): Promise<SessionRecord> {
    const path = this.statePath(sessionId);
    let content: string;
    try {
      content = await safeReadTextFile(path);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      if (isNotFoundError(error)) {
        throw new SessionPersistenceError(`Session "${sessionId}" not found`, 'not_found', {
          cause,
          details: `No state file exists at ${path}`,
        });
      }
      throw new SessionPersistenceError(
        `Failed to read session "${sessionId}": ${cause.message}`,
        'file_error',
        { cause }
      );
    }

    if (content.trim() === '') {
      throw new SessionPersistenceError(`State file of session "${sessionId}" is empty`, 'corruption_error');
    }

    try {
      return deserializeSessionRecord(content);
    } catch (error) {
      if (error instanceof SessionPersistenceError) {
        throw new SessionPersistenceError(
          `Error loading session "${sessionId}": ${error.message}`,
          error.errorType,
          { cause: error.cause, details: error.details }
        );
      }
      throw error;
    }
  }

  /**
   * Checks whether a session has been saved.
   */
  async exists(sessionId: string): Promise<boolean> {
    return safeExists(this.statePath(sessionId));
  }

  /**
   * Lists the ids of all saved sessions, sorted.
   */
  async list(): Promise<string[]> {
    if (!(await safeExists(this.root))) {
      return [];
    }
    const entries = await safeReaddir(this.root);
    const ids: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory() && SESSION_ID_PATTERN.test(entry.name) && (await this.exists(entry.name))) {
        ids.push(entry.name);
      }
    }
    return ids.sort();
  }

  /**
   * Appends an entry to a session's transcript.
   */
  async appendTranscript(sessionId: string, entry: TranscriptEntry): Promise<void> {
    const path = this.transcriptPath(sessionId);
    try {
      await safeMkdir(this.sessionDir(sessionId));
      await safeAppendTextFile(path, JSON.stringify(entry) + '\n');
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new SessionPersistenceError(
        `Failed to append transcript entry to "${path}": ${cause.message}`,
        'file_error',
        { cause, details: 'Check that the directory exists and is writable' }
      );
    }
  }

  /**
   * Reads a session's transcript; an absent transcript reads as empty.
   */
  async loadTranscript(sessionId: string): Promise<TranscriptEntry[]> {
    const path = this.transcriptPath(sessionId);
    let content: string;
    try {
      content = await safeReadTextFile(path);
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new SessionPersistenceError(`Failed to read transcript "${path}": ${cause.message}`, 'file_error', {
        cause,
      });
    }

    return content
      .split('\n')
      .map((line, index) => ({ line, lineNumber: index + 1 }))
      .filter(({ line }) => line.trim() !== '')
      .map(({ line, lineNumber }) => deserializeTranscriptEntry(line, lineNumber));
  }
}
