/**
 * TOML parser for document templates.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import type {
  DocumentTemplate,
  InferenceRule,
  SectionKind,
  TemplateOption,
  TemplateSection,
  TemplateTopic,
  TopicGate,
  TopicPack,
  TopicPlacement,
} from './types.js';
import { META_SECTION, OUTPUT_PATH_TOPIC, SECTION_IDS, isSectionId } from './types.js';

/**
 * Error class for template parsing errors.
 */
export class TemplateParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new TemplateParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'TemplateParseError';
    this.cause = cause;
  }
}

/** Regex pattern for semantic version. */
const SEMVER_PATTERN = /^\d+\.\d+\.\d+$/;

/** Dotted lower-case identifiers such as `endpoints.route`. */
const TOPIC_ID_PATTERN = /^[a-z][a-z0-9_-]*(\.[a-z][a-z0-9_-]*)*$/;

/** Pack identifiers are kebab-case. */
const PACK_ID_PATTERN = /^[a-z][a-z0-9-]*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new TemplateParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function validateNonEmptyString(value: unknown, fieldPath: string): string {
  const str = validateString(value, fieldPath);
  if (str.trim() === '') {
    throw new TemplateParseError(`Invalid value for '${fieldPath}': must not be empty`);
  }
  return str;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new TemplateParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new TemplateParseError(
      `Invalid type for '${fieldPath}': expected array, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) =>
    validateNonEmptyString(item, `${fieldPath}[${String(index)}]`)
  );
}

function validateTableArray(value: unknown, fieldPath: string): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    throw new TemplateParseError(
      `Invalid type for '${fieldPath}': expected array of tables, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new TemplateParseError(
        `Invalid type for '${fieldPath}[${String(index)}]': expected table, got ${typeof item}`
      );
    }
    return item;
  });
}

/**
 * Labels are rendered as `**Label:**` and read back from documents, so they
 * may not contain the characters that delimit them.
 */
function validateLabel(value: unknown, fieldPath: string): string {
  const label = validateNonEmptyString(value, fieldPath).trim();
  if (/[:*\n\r]/.test(label)) {
    throw new TemplateParseError(
      `Invalid value for '${fieldPath}': labels may not contain ':', '*' or line breaks`
    );
  }
  return label;
}

function parseMeta(raw: unknown): { name: string; version: string } {
  if (!isRecord(raw)) {
    throw new TemplateParseError("Missing required section: 'template'");
  }
  const name = validateNonEmptyString(raw.name, 'template.name');
  const version = validateString(raw.version, 'template.version');
  if (!SEMVER_PATTERN.test(version)) {
    throw new TemplateParseError(
      `Invalid format for 'template.version': expected semantic version (e.g., '1.0.0'), got '${version}'`
    );
  }
  return { name, version };
}

function parseSections(raw: unknown): TemplateSection[] {
  if (raw === undefined) {
    throw new TemplateParseError("Missing required section: 'sections'");
  }
  const tables = validateTableArray(raw, 'sections');
  if (tables.length === 0) {
    throw new TemplateParseError("Invalid value for 'sections': at least one section is required");
  }

  const seen = new Set<string>();
  return tables.map((table, index) => {
    const path = `sections[${String(index)}]`;
    const id = validateString(table.id, `${path}.id`);
    if (!isSectionId(id)) {
      throw new TemplateParseError(
        `Invalid value for '${path}.id': expected one of [${SECTION_IDS.join(', ')}], got '${id}'`
      );
    }
    if (seen.has(id)) {
      throw new TemplateParseError(`Duplicate section id '${id}'`);
    }
    seen.add(id);

    let kind: SectionKind = id === 'tasks' ? 'tasks' : 'facts';
    if ('kind' in table) {
      const rawKind = validateString(table.kind, `${path}.kind`);
      if (rawKind !== 'facts' && rawKind !== 'tasks') {
        throw new TemplateParseError(
          `Invalid value for '${path}.kind': expected one of [facts, tasks], got '${rawKind}'`
        );
      }
      kind = rawKind;
    }

    return { id, heading: validateNonEmptyString(table.heading, `${path}.heading`), kind };
  });
}

function parsePacks(raw: unknown): TopicPack[] {
  if (raw === undefined) {
    return [];
  }
  const seen = new Set<string>();
  return validateTableArray(raw, 'packs').map((table, index) => {
    const path = `packs[${String(index)}]`;
    const id = validateString(table.id, `${path}.id`);
    if (!PACK_ID_PATTERN.test(id)) {
      throw new TemplateParseError(
        `Invalid format for '${path}.id': expected kebab-case starting with a letter, got '${id}'`
      );
    }
    if (seen.has(id)) {
      throw new TemplateParseError(`Duplicate pack id '${id}'`);
    }
    seen.add(id);

    const keywords = validateStringArray(table.keywords, `${path}.keywords`);
    if (keywords.length === 0) {
      throw new TemplateParseError(`Invalid value for '${path}.keywords': must not be empty`);
    }

    return {
      id,
      title: validateNonEmptyString(table.title, `${path}.title`),
      keywords: keywords.map((k) => k.toLowerCase()),
    };
  });
}

function parseOptions(raw: unknown, path: string): TemplateOption[] {
  if (raw === undefined) {
    return [];
  }
  const labels = new Set<string>();
  return validateTableArray(raw, `${path}.options`).map((table, index) => {
    const optionPath = `${path}.options[${String(index)}]`;
    const label = validateNonEmptyString(table.label, `${optionPath}.label`).trim();
    const key = label.toLowerCase();
    if (labels.has(key)) {
      throw new TemplateParseError(`Duplicate option label '${label}' in '${path}'`);
    }
    labels.add(key);

    return {
      label,
      description:
        'description' in table ? validateString(table.description, `${optionPath}.description`) : '',
      recommended:
        'recommended' in table
          ? validateBoolean(table.recommended, `${optionPath}.recommended`)
          : false,
    };
  });
}

function parseGate(raw: unknown, path: string): TopicGate | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new TemplateParseError(`Invalid type for '${path}.when': expected table`);
  }
  const anyOf = validateStringArray(raw.any_of, `${path}.when.any_of`);
  if (anyOf.length === 0) {
    throw new TemplateParseError(`Invalid value for '${path}.when.any_of': must not be empty`);
  }
  return { topic: validateNonEmptyString(raw.topic, `${path}.when.topic`), anyOf };
}

function parseInferenceRules(raw: unknown, path: string): InferenceRule[] {
  if (raw === undefined) {
    return [];
  }
  return validateTableArray(raw, `${path}.infer`).map((table, index) => {
    const rulePath = `${path}.infer[${String(index)}]`;
    const pattern = validateNonEmptyString(table.pattern, `${rulePath}.pattern`);
    try {
      new RegExp(pattern, 'i');
    } catch (error) {
      const regexError = error instanceof Error ? error : new Error(String(error));
      throw new TemplateParseError(
        `Invalid regular expression for '${rulePath}.pattern': ${regexError.message}`,
        regexError
      );
    }
    return { pattern, value: validateNonEmptyString(table.value, `${rulePath}.value`).trim() };
  });
}

function parseTopic(
  table: Record<string, unknown>,
  index: number,
  sections: readonly TemplateSection[],
  packs: readonly TopicPack[]
): TemplateTopic {
  const path = `topics[${String(index)}]`;

  const id = validateString(table.id, `${path}.id`);
  if (!TOPIC_ID_PATTERN.test(id)) {
    throw new TemplateParseError(
      `Invalid format for '${path}.id': expected dotted lower-case identifier, got '${id}'`
    );
  }

  const rawSection = validateString(table.section, `${path}.section`);
  let section: TopicPlacement;
  if (rawSection === META_SECTION) {
    section = META_SECTION;
  } else {
    const declared = sections.find((s) => s.id === rawSection);
    if (declared === undefined) {
      throw new TemplateParseError(
        `Topic '${id}' is placed in section '${rawSection}' which the template does not declare`
      );
    }
    if (declared.kind === 'tasks') {
      throw new TemplateParseError(
        `Topic '${id}' cannot be placed in derived section '${rawSection}'`
      );
    }
    section = declared.id;
  }
  if (id === OUTPUT_PATH_TOPIC && section !== META_SECTION) {
    throw new TemplateParseError(`Topic '${OUTPUT_PATH_TOPIC}' must be placed in section 'meta'`);
  }

  const options = parseOptions(table.options, path);
  const allowMultiple =
    'allow_multiple' in table ? validateBoolean(table.allow_multiple, `${path}.allow_multiple`) : false;
  const allowCustom =
    'allow_custom' in table ? validateBoolean(table.allow_custom, `${path}.allow_custom`) : false;

  if (options.length === 0 && !allowCustom) {
    throw new TemplateParseError(
      `Topic '${id}' offers no options and does not allow custom answers`
    );
  }
  const recommendedCount = options.filter((o) => o.recommended).length;
  if (options.length > 1 && recommendedCount !== 1) {
    throw new TemplateParseError(
      `Topic '${id}' offers ${String(options.length)} options and must mark exactly one as recommended (found ${String(recommendedCount)})`
    );
  }
  if (recommendedCount > 1) {
    throw new TemplateParseError(`Topic '${id}' marks more than one option as recommended`);
  }

  let pack: string | undefined;
  if ('pack' in table) {
    pack = validateString(table.pack, `${path}.pack`);
    const packId = pack;
    if (!packs.some((p) => p.id === packId)) {
      throw new TemplateParseError(`Topic '${id}' references unknown pack '${packId}'`);
    }
  }

  const infer = parseInferenceRules(table.infer, path);
  if (!allowCustom) {
    for (const rule of infer) {
      if (!options.some((o) => o.label.toLowerCase() === rule.value.toLowerCase())) {
        throw new TemplateParseError(
          `Topic '${id}' infers '${rule.value}' which is not one of its options`
        );
      }
    }
  }

  let task: string | undefined;
  if ('task' in table) {
    task = validateNonEmptyString(table.task, `${path}.task`);
    if (!task.includes('{value}')) {
      throw new TemplateParseError(`Invalid value for '${path}.task': must contain '{value}'`);
    }
  }

  return {
    id,
    section,
    group: validateNonEmptyString(table.group, `${path}.group`).trim(),
    label: validateLabel(table.label, `${path}.label`),
    question: validateNonEmptyString(table.question, `${path}.question`).trim(),
    options,
    allowMultiple,
    allowCustom,
    when: parseGate(table.when, path),
    pack,
    infer,
    task,
  };
}

/**
 * Verifies gate references and rejects cycles, which would leave topics
 * waiting on each other forever.
 */
function validateGates(topics: readonly TemplateTopic[]): void {
  const byId = new Map(topics.map((topic): [string, TemplateTopic] => [topic.id, topic]));

  for (const topic of topics) {
    if (topic.when === undefined) {
      continue;
    }
    const gateTopic = byId.get(topic.when.topic);
    if (gateTopic === undefined) {
      throw new TemplateParseError(
        `Topic '${topic.id}' is gated on unknown topic '${topic.when.topic}'`
      );
    }
    if (!gateTopic.allowCustom) {
      for (const value of topic.when.anyOf) {
        if (!gateTopic.options.some((o) => o.label.toLowerCase() === value.toLowerCase())) {
          throw new TemplateParseError(
            `Topic '${topic.id}' is gated on '${value}' which is not an option of '${gateTopic.id}'`
          );
        }
      }
    }
  }

  for (const topic of topics) {
    const visited = new Set<string>([topic.id]);
    let current = topic.when?.topic;
    while (current !== undefined) {
      if (visited.has(current)) {
        throw new TemplateParseError(`Gate cycle detected starting at topic '${topic.id}'`);
      }
      visited.add(current);
      current = byId.get(current)?.when?.topic;
    }
  }
}

/**
 * Parses a TOML document template.
 *
 * @param tomlContent - Raw TOML text.
 * @returns The validated template.
 * @throws TemplateParseError for invalid TOML syntax or an invalid template.
 *
 * @example
 * ```typescript
 * const template = parseTemplate(`
 * [template]
 * name = "minimal"
 * version = "1.0.0"
 *
 * [[sections]]
 * id = "decisions"
 * heading = "Technical Decisions"
 *
 * [[topics]]
 * id = "decisions.storage"
 * section = "decisions"
 * group = "Data"
 * label = "Storage"
 * question = "Where is state kept?"
 * allow_custom = true
 * `);
 * ```
 */
export function parseTemplate(tomlContent: string): DocumentTemplate {
  let parsed: TOML.JsonMap;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new TemplateParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  const meta = parseMeta(parsed.template);
  const sections = parseSections(parsed.sections);
  const packs = parsePacks(parsed.packs);

  if (parsed.topics === undefined) {
    throw new TemplateParseError("Missing required section: 'topics'");
  }
  const topicTables = validateTableArray(parsed.topics, 'topics');

  const seenIds = new Set<string>();
  const seenLabels = new Set<string>();
  const topics = topicTables.map((table, index) => {
    const topic = parseTopic(table, index, sections, packs);
    if (seenIds.has(topic.id)) {
      throw new TemplateParseError(`Duplicate topic id '${topic.id}'`);
    }
    seenIds.add(topic.id);
    const labelKey = topic.label.toLowerCase();
    if (seenLabels.has(labelKey)) {
      throw new TemplateParseError(`Duplicate topic label '${topic.label}'`);
    }
    seenLabels.add(labelKey);
    return topic;
  });

  validateGates(topics);

  return { ...meta, sections, packs, topics };
}
