/**
 * Answer validation and merging.
 *
 * @packageDocumentation
 */

import type { DocumentTemplate } from '../template/types.js';
import { findTopic } from '../template/types.js';
import { InvalidAnswerError, type ValidationDetail } from './errors.js';
import { factIndex, stateSlug, topicStatus } from './questions.js';
import type { AnswerRecord, DecisionState, Fact } from './types.js';
import { dedupeValues, isAmbiguousValue, matchOption } from './values.js';

/**
 * Validates answers against the template and the current state.
 *
 * Collects every problem instead of stopping at the first one.
 *
 * @returns Validation details; empty when the answers are acceptable.
 */
export function validateAnswers(
  template: DocumentTemplate,
  state: DecisionState,
  answers: AnswerRecord
): ValidationDetail[] {
  const details: ValidationDetail[] = [];
  const facts = factIndex(state.facts);
  const slug = stateSlug(state);

  for (const [field, values] of Object.entries(answers)) {
    const topic = findTopic(template, field);
    if (topic === undefined) {
      details.push({ field, message: 'Unknown question' });
      continue;
    }
    if (facts.has(field)) {
      details.push({ field, message: 'Question is already resolved' });
      continue;
    }
    const status = topicStatus(template, topic, facts, state.packs);
    if (status !== 'open') {
      details.push({
        field,
        message:
          status === 'pending'
            ? 'Question cannot be answered before the question it depends on'
            : 'Question does not apply to this document',
      });
      continue;
    }

    if (values.length === 0) {
      details.push({ field, message: 'At least one value is required' });
      continue;
    }
    if (values.length > 1 && !topic.allowMultiple) {
      details.push({
        field,
        message: `Only one value may be chosen, got ${String(values.length)}`,
      });
    }

    for (const value of values) {
      if (/[\r\n]/.test(value)) {
        details.push({ field, message: 'Values must be a single line', received: value });
      } else if (isAmbiguousValue(value)) {
        details.push({
          field,
          message: 'Value is empty or ambiguous; choose an option or state a decision',
          received: value,
        });
      } else if (!topic.allowCustom && matchOption(topic, value, slug) === undefined) {
        details.push({
          field,
          message: 'Value is not one of the offered options',
          received: value,
        });
      }
    }
  }

  return details;
}

/**
 * Merges validated answers into a new state.
 *
 * The input state is never modified. New facts are appended in template order
 * so that the fact list does not depend on the order answers were collected.
 *
 * @param now - Clock used for `updatedAt`.
 * @throws InvalidAnswerError if any answer fails validation.
 */
export function mergeAnswers(
  template: DocumentTemplate,
  state: DecisionState,
  answers: AnswerRecord,
  now: () => Date = () => new Date()
): DecisionState {
  const details = validateAnswers(template, state, answers);
  if (details.length > 0) {
    throw new InvalidAnswerError(details);
  }

  const round = state.round + 1;
  const slug = stateSlug(state);
  const added: Fact[] = [];

  for (const topic of template.topics) {
    const values = answers[topic.id];
    if (values === undefined) {
      continue;
    }
    const canonical = dedupeValues(
      values.map((value) => matchOption(topic, value, slug) ?? value.trim())
    );
    const fact: Fact = { key: topic.id, values: canonical, source: 'answer', round };
    added.push(fact);
  }

  return freezeState({
    ...state,
    facts: [...state.facts, ...added],
    round,
    updatedAt: now().toISOString(),
  });
}

/**
 * Freezes a state and its fact list.
 */
export function freezeState(state: DecisionState): DecisionState {
  return Object.freeze({
    ...state,
    seed: Object.freeze({ ...state.seed }),
    packs: Object.freeze([...state.packs]),
    facts: Object.freeze(
      state.facts.map((fact) => Object.freeze({ ...fact, values: Object.freeze([...fact.values]) }))
    ),
  });
}
