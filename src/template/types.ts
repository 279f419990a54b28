/**
 * Document template types.
 *
 * A template fixes, by convention, which sections a rendered document may
 * contain and which decisions (topics) must be settled to fill them. Topics
 * double as the source of interview questions.
 *
 * @packageDocumentation
 */

/**
 * Identifiers of the sections a document can contain.
 */
export type SectionId =
  | 'flow'
  | 'decisions'
  | 'endpoints'
  | 'migrations'
  | 'components'
  | 'tasks'
  | 'tests';

/**
 * All section identifiers, in conventional document order.
 */
export const SECTION_IDS: readonly SectionId[] = [
  'flow',
  'decisions',
  'endpoints',
  'migrations',
  'components',
  'tasks',
  'tests',
] as const;

/**
 * Pseudo-section for topics that steer the session but are not rendered
 * (the output path, for instance).
 */
export const META_SECTION = 'meta';

/**
 * Where a topic's answer ends up.
 */
export type TopicPlacement = SectionId | typeof META_SECTION;

/**
 * How a section's body is produced.
 *
 * - `facts`: one line per applicable topic
 * - `tasks`: numbered list derived from the `task` patterns of every rendered topic
 */
export type SectionKind = 'facts' | 'tasks';

/**
 * A document section.
 */
export interface TemplateSection {
  readonly id: SectionId;
  /** Heading text rendered as `## <heading>`. */
  readonly heading: string;
  readonly kind: SectionKind;
}

/**
 * A candidate answer for a topic.
 */
export interface TemplateOption {
  /** Option label; may contain `{slug}`. */
  readonly label: string;
  readonly description: string;
  readonly recommended: boolean;
}

/**
 * Condition under which a topic applies: another topic must be resolved with
 * at least one of the listed values.
 */
export interface TopicGate {
  readonly topic: string;
  readonly anyOf: readonly string[];
}

/**
 * Keyword rule that resolves a topic straight from seed text.
 */
export interface InferenceRule {
  /** Case-insensitive regular expression source. */
  readonly pattern: string;
  /** Value recorded when the pattern matches. */
  readonly value: string;
}

/**
 * A decision the document needs, and the question that settles it.
 */
export interface TemplateTopic {
  /** Unique dotted identifier, e.g. `endpoints.route`. */
  readonly id: string;
  readonly section: TopicPlacement;
  /** Batch grouping for the interview, e.g. "Interface". */
  readonly group: string;
  /** Label rendered before the value, unique across the template. */
  readonly label: string;
  /** Question text. */
  readonly question: string;
  readonly options: readonly TemplateOption[];
  readonly allowMultiple: boolean;
  /** Whether free text is accepted besides the listed options. */
  readonly allowCustom: boolean;
  readonly when?: TopicGate | undefined;
  /** Pack the topic belongs to; only asked when the pack is active. */
  readonly pack?: string | undefined;
  readonly infer: readonly InferenceRule[];
  /** Task pattern containing `{value}`. */
  readonly task?: string | undefined;
}

/**
 * A bundle of domain-specific topics switched on by seed keywords.
 */
export interface TopicPack {
  readonly id: string;
  readonly title: string;
  /** Lower-case substrings searched in the seed text. */
  readonly keywords: readonly string[];
}

/**
 * A complete, validated document template.
 */
export interface DocumentTemplate {
  readonly name: string;
  readonly version: string;
  readonly sections: readonly TemplateSection[];
  readonly packs: readonly TopicPack[];
  /** Topics in question order. */
  readonly topics: readonly TemplateTopic[];
}

/**
 * Topic id reserved for the output path of the rendered document.
 */
export const OUTPUT_PATH_TOPIC = 'output.path';

/**
 * Finds a topic by id.
 */
export function findTopic(template: DocumentTemplate, topicId: string): TemplateTopic | undefined {
  return template.topics.find((topic) => topic.id === topicId);
}

/**
 * Checks if a string is a valid SectionId.
 */
export function isSectionId(value: string): value is SectionId {
  return (SECTION_IDS as readonly string[]).includes(value);
}
