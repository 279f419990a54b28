/**
 * Document template module: the sections a document may carry and the topics
 * that must be settled to fill them.
 *
 * @packageDocumentation
 */

export { parseTemplate, TemplateParseError } from './parser.js';
export { loadTemplate, DEFAULT_TEMPLATE_PATH } from './loader.js';
export type {
  DocumentTemplate,
  InferenceRule,
  SectionId,
  SectionKind,
  TemplateOption,
  TemplateSection,
  TemplateTopic,
  TopicGate,
  TopicPack,
  TopicPlacement,
} from './types.js';
export {
  SECTION_IDS,
  META_SECTION,
  OUTPUT_PATH_TOPIC,
  findTopic,
  isSectionId,
} from './types.js';
