/**
 * Seed analysis: reading references, parsing previously rendered documents
 * and inferring facts from free text.
 *
 * @packageDocumentation
 */

import { basename, extname } from 'node:path';
import type { DocumentTemplate, TemplateTopic } from '../template/types.js';
import { OUTPUT_PATH_TOPIC } from '../template/types.js';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { UnresolvableSeedError } from './errors.js';
import type { SeedInput } from './types.js';
import {
  canonicalValue,
  dedupeValues,
  deriveTitle,
  isAmbiguousValue,
  matchOption,
  slugify,
} from './values.js';

/**
 * Topic values keyed by topic id, in template order.
 */
export type TopicValues = ReadonlyMap<string, readonly string[]>;

/**
 * Facts recovered from a rendered document.
 */
export interface ParsedDocument {
  /** Text of the first `# ` heading, if any. */
  readonly title: string | undefined;
  /** Values of every recognised label. */
  readonly facts: TopicValues;
}

/**
 * What a seed contributes to a new session.
 */
export interface SeedAnalysis {
  readonly title: string;
  /** Active pack ids, in template order. */
  readonly packs: readonly string[];
  /** Parsed and inferred values, in template order. */
  readonly facts: TopicValues;
}

const TITLE_LINE = /^#\s+(.+?)\s*$/;
const INLINE_FACT_LINE = /^[-*]\s+\*\*([^*:\n]+):\*\*\s+(.+?)\s*$/;
const LIST_FACT_LINE = /^[-*]\s+\*\*([^*:\n]+):\*\*\s*$/;
const NESTED_VALUE_LINE = /^(?:\s{2,}|\t)[-*]\s+(.+?)\s*$/;

function orderByTemplate(
  template: DocumentTemplate,
  values: ReadonlyMap<string, readonly string[]>
): Map<string, readonly string[]> {
  const ordered = new Map<string, readonly string[]>();
  for (const topic of template.topics) {
    const topicValues = values.get(topic.id);
    if (topicValues !== undefined) {
      ordered.set(topic.id, topicValues);
    }
  }
  return ordered;
}

/**
 * Parses a Markdown document rendered from the same template back into facts.
 *
 * Recognises the `# Title` heading, `- **Label:** value` lines and labels
 * followed by a nested list of values. Unknown labels, placeholder values and
 * the derived tasks list are ignored.
 *
 * @example
 * ```typescript
 * const parsed = parseRenderedDocument('# Login\n\n## Endpoints\n\n- **Route:** POST /login\n', template);
 * parsed.facts.get('endpoints.route'); // ['POST /login']
 * ```
 */
export function parseRenderedDocument(text: string, template: DocumentTemplate): ParsedDocument {
  const byLabel = new Map<string, TemplateTopic>(
    template.topics.map((topic): [string, TemplateTopic] => [topic.label.toLowerCase(), topic])
  );
  const collected = new Map<string, string[]>();
  let title: string | undefined;
  let listTopic: TemplateTopic | undefined;

  const record = (topic: TemplateTopic, value: string): void => {
    if (isAmbiguousValue(value)) {
      return;
    }
    const existing = collected.get(topic.id);
    if (existing === undefined) {
      collected.set(topic.id, [value]);
    } else if (topic.allowMultiple) {
      existing.push(value);
    }
  };

  for (const line of text.split(/\r?\n/)) {
    const nested = NESTED_VALUE_LINE.exec(line);
    if (nested !== null && listTopic !== undefined) {
      record(listTopic, nested[1] ?? '');
      continue;
    }
    listTopic = undefined;

    const heading = TITLE_LINE.exec(line);
    if (heading !== null) {
      title ??= heading[1];
      continue;
    }

    const inline = INLINE_FACT_LINE.exec(line);
    if (inline !== null) {
      const topic = byLabel.get((inline[1] ?? '').trim().toLowerCase());
      if (topic !== undefined && !collected.has(topic.id)) {
        record(topic, inline[2] ?? '');
      }
      continue;
    }

    const list = LIST_FACT_LINE.exec(line);
    if (list !== null) {
      const topic = byLabel.get((list[1] ?? '').trim().toLowerCase());
      listTopic = topic !== undefined && !collected.has(topic.id) ? topic : undefined;
    }
  }

  const slug = slugify(title ?? '');
  const facts = new Map<string, readonly string[]>();
  for (const [topicId, values] of collected) {
    const topic = template.topics.find((t) => t.id === topicId);
    if (topic !== undefined) {
      facts.set(topicId, dedupeValues(values.map((v) => canonicalValue(topic, v, slug))));
    }
  }

  return { title, facts: orderByTemplate(template, facts) };
}

/**
 * Finds the packs whose keywords occur in the text.
 */
export function detectPacks(text: string, template: DocumentTemplate): string[] {
  const haystack = text.toLowerCase();
  return template.packs
    .filter((pack) => pack.keywords.some((keyword) => haystack.includes(keyword)))
    .map((pack) => pack.id);
}

/**
 * Applies inference rules to seed text.
 *
 * For every topic whose pack is active, the first matching rule decides the
 * value. Topics listed in `known` are left alone.
 */
export function inferFacts(
  text: string,
  template: DocumentTemplate,
  packs: readonly string[],
  slug: string,
  known: TopicValues = new Map()
): Map<string, readonly string[]> {
  const inferred = new Map<string, readonly string[]>();

  for (const topic of template.topics) {
    if (known.has(topic.id) || topic.infer.length === 0) {
      continue;
    }
    if (topic.pack !== undefined && !packs.includes(topic.pack)) {
      continue;
    }
    const rule = topic.infer.find((r) => new RegExp(r.pattern, 'i').test(text));
    if (rule !== undefined) {
      inferred.set(topic.id, [matchOption(topic, rule.value, slug) ?? rule.value]);
    }
  }

  return inferred;
}

/**
 * Reads the text a seed refers to.
 *
 * @throws UnresolvableSeedError if the description is blank or the referenced
 * file cannot be read.
 */
export async function readSeedText(seed: SeedInput): Promise<string> {
  if (seed.kind === 'description') {
    if (seed.payload.trim() === '') {
      throw new UnresolvableSeedError('Seed description is empty');
    }
    return seed.payload;
  }

  if (seed.payload.trim() === '') {
    throw new UnresolvableSeedError('Seed reference is empty');
  }
  let text: string;
  try {
    text = await safeReadTextFile(seed.payload);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new UnresolvableSeedError(`Cannot read seed file "${seed.payload}": ${cause.message}`, {
      seedPath: seed.payload,
      cause,
    });
  }
  if (text.trim() === '') {
    throw new UnresolvableSeedError(`Seed file "${seed.payload}" is empty`, {
      seedPath: seed.payload,
    });
  }
  return text;
}

function titleFromPath(path: string): string {
  const stem = basename(path, extname(path)).replace(/[-_]+/g, ' ');
  return deriveTitle(stem) ?? 'Untitled';
}

/**
 * Turns seed text into a title, active packs and initial facts.
 *
 * A reference that parses as a rendered document keeps its facts, and only
 * its title and pack topics decide which packs are active, so values such as
 * "Notification sent" do not pull in new packs on a re-read. Any other text is
 * searched as a whole for pack keywords and inference matches.
 */
export function analyzeSeed(seed: SeedInput, text: string, template: DocumentTemplate): SeedAnalysis {
  if (seed.kind === 'description') {
    const title = deriveTitle(text) ?? 'Untitled';
    const packs = detectPacks(text, template);
    return { title, packs, facts: inferFacts(text, template, packs, slugify(title)) };
  }

  const parsed = parseRenderedDocument(text, template);
  const title = parsed.title ?? titleFromPath(seed.payload);
  const slug = slugify(title);
  const recognised = parsed.facts.size > 0;

  let packs: string[];
  let inferenceText: string;
  if (recognised) {
    const fromFacts = new Set(
      template.topics
        .filter((topic) => topic.pack !== undefined && parsed.facts.has(topic.id))
        .map((topic) => topic.pack)
    );
    const fromTitle = new Set(detectPacks(title, template));
    packs = template.packs
      .filter((pack) => fromFacts.has(pack.id) || fromTitle.has(pack.id))
      .map((pack) => pack.id);
    inferenceText = title;
  } else {
    packs = detectPacks(text, template);
    inferenceText = text;
  }

  const facts = new Map<string, readonly string[]>(parsed.facts);
  for (const [topicId, values] of inferFacts(inferenceText, template, packs, slug, parsed.facts)) {
    facts.set(topicId, values);
  }
  if (template.topics.some((topic) => topic.id === OUTPUT_PATH_TOPIC) && !facts.has(OUTPUT_PATH_TOPIC)) {
    facts.set(OUTPUT_PATH_TOPIC, [seed.payload]);
  }

  return { title, packs, facts: orderByTemplate(template, facts) };
}
