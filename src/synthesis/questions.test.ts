import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { parseTemplate } from '../template/parser.js';
import type { TemplateTopic } from '../template/types.js';
import {
  batchQuestions,
  buildQuestion,
  factIndex,
  iterateOpenQuestions,
  topicStatus,
} from './questions.js';
import type { DecisionState, Fact, Question } from './types.js';

const template = parseTemplate(`
[template]
name = "questions-test"
version = "1.0.0"

[[sections]]
id = "decisions"
heading = "Technical Decisions"

[[sections]]
id = "migrations"
heading = "Migrations"

[[packs]]
id = "caching"
title = "Caching"
keywords = ["cache"]

[[topics]]
id = "data.persistence"
section = "decisions"
group = "Data"
label = "Persistence"
question = "New storage?"
options = [
  { label = "No new storage", recommended = true },
  { label = "New table" },
]

[[topics]]
id = "migrations.tables"
section = "migrations"
group = "Data"
label = "Tables"
question = "Which tables?"
allow_custom = true
when = { topic = "data.persistence", any_of = ["New table"] }

[[topics]]
id = "migrations.index"
section = "migrations"
group = "Data"
label = "Index"
question = "Which index?"
allow_custom = true
when = { topic = "migrations.tables", any_of = ["users"] }

[[topics]]
id = "cache.store"
section = "decisions"
group = "Data"
pack = "caching"
label = "Cache store"
question = "Where?"
options = [{ label = "Redis for {slug}", recommended = true }]
`);

function topic(id: string): TemplateTopic {
  const found = template.topics.find((t) => t.id === id);
  if (found === undefined) {
    throw new Error(`missing topic ${id}`);
  }
  return found;
}

function fact(key: string, ...values: string[]): Fact {
  return { key, values, source: 'answer', round: 1 };
}

function stateWith(facts: Fact[], packs: string[] = []): DecisionState {
  return {
    version: '1.0.0',
    sessionId: 'session-1',
    seed: { kind: 'description', payload: 'Orders cache' },
    title: 'Orders cache',
    packs,
    facts,
    round: 1,
    createdAt: '2026-01-15T10:00:00.000Z',
    updatedAt: '2026-01-15T10:00:00.000Z',
  };
}

function question(id: string, group: string): Question {
  return {
    id,
    topicId: id,
    group,
    text: id,
    options: [],
    allowMultiple: false,
    allowCustom: true,
  };
}

describe('questions', () => {
  describe('topicStatus', () => {
    it('should be pending while the gate topic is unresolved', () => {
      expect(topicStatus(template, topic('migrations.tables'), factIndex([]), [])).toBe('pending');
    });

    it('should open when the gate value matches, ignoring case', () => {
      const facts = factIndex([fact('data.persistence', 'new TABLE')]);
      expect(topicStatus(template, topic('migrations.tables'), facts, [])).toBe('open');
    });

    it('should close when the gate value does not match', () => {
      const facts = factIndex([fact('data.persistence', 'No new storage')]);
      expect(topicStatus(template, topic('migrations.tables'), facts, [])).toBe('closed');
    });

    it('should close topics gated on a closed topic', () => {
      const facts = factIndex([fact('data.persistence', 'No new storage'), fact('migrations.tables', 'users')]);
      expect(topicStatus(template, topic('migrations.index'), facts, [])).toBe('closed');
    });

    it('should follow chains of gates', () => {
      const pending = factIndex([fact('data.persistence', 'New table')]);
      expect(topicStatus(template, topic('migrations.index'), pending, [])).toBe('pending');

      const open = factIndex([fact('data.persistence', 'New table'), fact('migrations.tables', 'users')]);
      expect(topicStatus(template, topic('migrations.index'), open, [])).toBe('open');
    });

    it('should close pack topics unless the pack is active', () => {
      expect(topicStatus(template, topic('cache.store'), factIndex([]), [])).toBe('closed');
      expect(topicStatus(template, topic('cache.store'), factIndex([]), ['caching'])).toBe('open');
    });
  });

  describe('iterateOpenQuestions', () => {
    it('should yield only open unresolved topics, lazily', () => {
      const iterator = iterateOpenQuestions(template, stateWith([], ['caching']));

      const nextId = (): string | undefined => {
        const result = iterator.next();
        return result.done === true ? undefined : result.value.id;
      };

      expect(nextId()).toBe('data.persistence');
      expect(nextId()).toBe('cache.store');
      expect(nextId()).toBeUndefined();
    });

    it('should skip resolved topics and surface newly opened ones', () => {
      const ids = [
        ...iterateOpenQuestions(template, stateWith([fact('data.persistence', 'New table')])),
      ].map((q) => q.id);
      expect(ids).toEqual(['migrations.tables']);
    });
  });

  describe('buildQuestion', () => {
    it('should substitute the slug into option labels', () => {
      expect(buildQuestion(topic('cache.store'), 'orders-cache')).toEqual({
        id: 'cache.store',
        topicId: 'cache.store',
        group: 'Data',
        text: 'Where?',
        options: [{ label: 'Redis for orders-cache', description: '', isRecommended: true }],
        allowMultiple: false,
        allowCustom: false,
      });
    });
  });

  describe('batchQuestions', () => {
    it('should group by first appearance and split large groups', () => {
      const batches = batchQuestions(
        [
          question('a', 'Scope'),
          question('b', 'Data'),
          question('c', 'Scope'),
          question('d', 'Scope'),
          question('e', 'Data'),
        ],
        2
      );

      expect(batches.map((b) => [b.group, b.questions.map((q) => q.id)])).toEqual([
        ['Scope', ['a', 'c']],
        ['Scope', ['d']],
        ['Data', ['b', 'e']],
      ]);
    });

    it('should keep every question exactly once and respect the batch size', () => {
      fc.assert(
        fc.property(
          fc.array(fc.constantFrom('Scope', 'Data', 'Quality'), { maxLength: 30 }),
          fc.integer({ min: 1, max: 6 }),
          (groups, size) => {
            const questions = groups.map((group, index) => question(`q${String(index)}`, group));
            const batches = batchQuestions(questions, size);

            const ids = batches.flatMap((b) => b.questions.map((q) => q.id));
            expect([...ids].sort()).toEqual(questions.map((q) => q.id).sort());
            for (const batch of batches) {
              expect(batch.questions.length).toBeGreaterThan(0);
              expect(batch.questions.length).toBeLessThanOrEqual(size);
              expect(batch.questions.every((q) => q.group === batch.group)).toBe(true);
            }
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
