/**
 * Topic applicability and question generation.
 *
 * @packageDocumentation
 */

import type { DocumentTemplate, TemplateTopic } from '../template/types.js';
import { findTopic } from '../template/types.js';
import type { DecisionState, Fact, Question, QuestionBatch } from './types.js';
import { slugify, substituteSlug } from './values.js';

/**
 * Applicability of a topic for a given state.
 *
 * - `open`: the topic applies and needs a fact
 * - `pending`: the gate topic is not settled yet
 * - `closed`: the topic does not apply to this document
 */
export type TopicStatus = 'open' | 'pending' | 'closed';

/**
 * Indexes facts by key. Keys are unique within a state.
 */
export function factIndex(facts: readonly Fact[]): ReadonlyMap<string, Fact> {
  return new Map(facts.map((fact): [string, Fact] => [fact.key, fact]));
}

/**
 * Document slug of a state, derived from its title.
 */
export function stateSlug(state: DecisionState): string {
  return slugify(state.title);
}

/**
 * Determines whether a topic applies.
 *
 * A topic is closed when its pack is inactive, when its gate topic is closed,
 * or when the gate topic was settled with none of the gating values.
 */
export function topicStatus(
  template: DocumentTemplate,
  topic: TemplateTopic,
  facts: ReadonlyMap<string, Fact>,
  packs: readonly string[]
): TopicStatus {
  if (topic.pack !== undefined && !packs.includes(topic.pack)) {
    return 'closed';
  }
  if (topic.when === undefined) {
    return 'open';
  }

  const gateTopic = findTopic(template, topic.when.topic);
  if (gateTopic === undefined) {
    return 'closed';
  }
  const gateStatus = topicStatus(template, gateTopic, facts, packs);
  if (gateStatus === 'closed') {
    return 'closed';
  }
  const gateFact = facts.get(gateTopic.id);
  if (gateStatus === 'pending' || gateFact === undefined) {
    return 'pending';
  }

  const wanted = topic.when.anyOf.map((v) => v.toLowerCase());
  return gateFact.values.some((v) => wanted.includes(v.toLowerCase())) ? 'open' : 'closed';
}

/**
 * Topics that apply to the document described by a state, in template order.
 */
export function applicableTopics(
  template: DocumentTemplate,
  state: DecisionState
): TemplateTopic[] {
  const facts = factIndex(state.facts);
  return template.topics.filter(
    (topic) => topicStatus(template, topic, facts, state.packs) === 'open'
  );
}

/**
 * Builds the question for a topic.
 */
export function buildQuestion(topic: TemplateTopic, slug: string): Question {
  return {
    id: topic.id,
    topicId: topic.id,
    group: topic.group,
    text: topic.question,
    options: topic.options.map((option) => ({
      label: substituteSlug(option.label, slug),
      description: option.description,
      isRecommended: option.recommended,
    })),
    allowMultiple: topic.allowMultiple,
    allowCustom: topic.allowCustom,
  };
}

/**
 * Lazily yields a question for every applicable topic without a fact.
 *
 * Topics waiting on an unsettled gate are skipped; they surface in a later
 * round once the gate topic has been answered.
 */
export function* iterateOpenQuestions(
  template: DocumentTemplate,
  state: DecisionState
): Generator<Question, void, undefined> {
  const facts = factIndex(state.facts);
  const slug = stateSlug(state);

  for (const topic of template.topics) {
    if (facts.has(topic.id)) {
      continue;
    }
    if (topicStatus(template, topic, facts, state.packs) === 'open') {
      yield buildQuestion(topic, slug);
    }
  }
}

/**
 * Groups questions into batches by their group, keeping the order in which
 * groups first appear, and splits groups larger than `maxPerBatch`.
 */
export function batchQuestions(
  questions: readonly Question[],
  maxPerBatch: number
): QuestionBatch[] {
  const size = Math.max(1, Math.floor(maxPerBatch));
  const groups = new Map<string, Question[]>();
  for (const question of questions) {
    const group = groups.get(question.group);
    if (group === undefined) {
      groups.set(question.group, [question]);
    } else {
      group.push(question);
    }
  }

  const batches: QuestionBatch[] = [];
  for (const [group, members] of groups) {
    for (let i = 0; i < members.length; i += size) {
      batches.push({ group, questions: members.slice(i, i + size) });
    }
  }
  return batches;
}
