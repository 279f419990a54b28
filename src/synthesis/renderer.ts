/**
 * Markdown rendering of a completed decision state.
 *
 * @packageDocumentation
 */

import type { DocumentTemplate, TemplateSection, TemplateTopic } from '../template/types.js';
import { OUTPUT_PATH_TOPIC } from '../template/types.js';
import { IncompleteStateError } from './errors.js';
import { applicableTopics, factIndex } from './questions.js';
import type { DecisionState, Fact, RenderedDocument, RenderedSection } from './types.js';
import { isAmbiguousValue } from './values.js';

/**
 * Lists applicable topics that lack a usable fact.
 *
 * A topic waiting on an unsettled gate is not listed itself; its gate topic
 * is, since that one is applicable and unresolved.
 */
export function findUnresolved(template: DocumentTemplate, state: DecisionState): string[] {
  const facts = factIndex(state.facts);
  return applicableTopics(template, state)
    .filter((topic) => {
      const fact = facts.get(topic.id);
      return (
        fact === undefined ||
        fact.values.length === 0 ||
        fact.values.some((value) => isAmbiguousValue(value) || /[\r\n]/.test(value))
      );
    })
    .map((topic) => topic.id);
}

function formatFact(topic: TemplateTopic, fact: Fact): string[] {
  const [first] = fact.values;
  if (fact.values.length === 1 && first !== undefined) {
    return [`- **${topic.label}:** ${first}`];
  }
  return [`- **${topic.label}:**`, ...fact.values.map((value) => `  - ${value}`)];
}

function factLines(
  section: TemplateSection,
  topics: readonly TemplateTopic[],
  facts: ReadonlyMap<string, Fact>
): string[] {
  const lines: string[] = [];
  for (const topic of topics) {
    const fact = facts.get(topic.id);
    if (topic.section === section.id && fact !== undefined) {
      lines.push(...formatFact(topic, fact));
    }
  }
  return lines;
}

/**
 * Derives the numbered task list from the task patterns of rendered topics,
 * following section order and then topic order.
 */
function taskLines(
  template: DocumentTemplate,
  topics: readonly TemplateTopic[],
  facts: ReadonlyMap<string, Fact>
): string[] {
  const tasks: string[] = [];
  for (const section of template.sections) {
    if (section.kind !== 'facts') {
      continue;
    }
    for (const topic of topics) {
      const fact = facts.get(topic.id);
      if (topic.section !== section.id || topic.task === undefined || fact === undefined) {
        continue;
      }
      const pattern = topic.task;
      tasks.push(...fact.values.map((value) => pattern.split('{value}').join(value)));
    }
  }
  return tasks.map((task, index) => `${String(index + 1)}. ${task}`);
}

/**
 * Renders a complete state into Markdown.
 *
 * Output is a pure function of the state and template: no timestamps or
 * session ids are written, so rendering the same state twice gives identical
 * text. Sections without any applicable topic are left out.
 *
 * @throws IncompleteStateError if an applicable topic has no usable fact.
 */
export function renderDocument(state: DecisionState, template: DocumentTemplate): RenderedDocument {
  const unresolved = findUnresolved(template, state);
  if (unresolved.length > 0) {
    throw new IncompleteStateError(unresolved);
  }

  const facts = factIndex(state.facts);
  const topics = applicableTopics(template, state);

  const sections: RenderedSection[] = [];
  for (const section of template.sections) {
    const lines =
      section.kind === 'tasks'
        ? taskLines(template, topics, facts)
        : factLines(section, topics, facts);
    if (lines.length > 0) {
      sections.push({ id: section.id, heading: section.heading, lines });
    }
  }

  const blocks = [
    `# ${state.title}`,
    ...sections.map((section) => `## ${section.heading}\n\n${section.lines.join('\n')}`),
  ];
  const outputTopicApplies = topics.some((topic) => topic.id === OUTPUT_PATH_TOPIC);

  return {
    title: state.title,
    outputPath: outputTopicApplies ? facts.get(OUTPUT_PATH_TOPIC)?.values[0] : undefined,
    sections,
    text: blocks.join('\n\n') + '\n',
  };
}
