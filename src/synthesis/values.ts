/**
 * Helpers for titles, slugs and answer values.
 *
 * @packageDocumentation
 */

import type { TemplateTopic } from '../template/types.js';

/** Maximum slug length. */
const MAX_SLUG_LENGTH = 60;

/** Slug used when a title has no usable characters. */
const FALLBACK_SLUG = 'document';

/**
 * Values that postpone a decision instead of making one.
 */
export const AMBIGUOUS_VALUES: ReadonlySet<string> = new Set([
  'tbd',
  'todo',
  'tba',
  '?',
  '??',
  '???',
  'unknown',
  'unsure',
  'not sure',
  'n/a',
  '...',
]);

/**
 * Checks if a value is empty or a placeholder.
 */
export function isAmbiguousValue(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return normalized === '' || AMBIGUOUS_VALUES.has(normalized);
}

/**
 * Derives a document title from seed text: the first non-empty line with
 * whitespace collapsed and the first letter capitalized.
 *
 * @returns The title, or undefined when the text is blank.
 */
export function deriveTitle(text: string): string | undefined {
  const line = text
    .split(/\r?\n/)
    .map((l) => l.replace(/\s+/g, ' ').trim())
    .find((l) => l !== '');
  if (line === undefined) {
    return undefined;
  }
  return line.charAt(0).toUpperCase() + line.slice(1);
}

/**
 * Converts a title into a path-safe slug.
 *
 * @example
 * ```typescript
 * slugify('Rate limiter for login endpoint'); // 'rate-limiter-for-login-endpoint'
 * ```
 */
export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '');
  return slug === '' ? FALLBACK_SLUG : slug;
}

/**
 * Replaces `{slug}` in a template string.
 */
export function substituteSlug(text: string, slug: string): string {
  return text.split('{slug}').join(slug);
}

/**
 * Option labels of a topic with the slug substituted.
 */
export function optionLabels(topic: TemplateTopic, slug: string): string[] {
  return topic.options.map((option) => substituteSlug(option.label, slug));
}

/**
 * Maps a value onto the matching option label, compared case-insensitively.
 *
 * @returns The canonical label, or undefined if the value matches no option.
 */
export function matchOption(topic: TemplateTopic, value: string, slug: string): string | undefined {
  const needle = value.trim().toLowerCase();
  return optionLabels(topic, slug).find((label) => label.toLowerCase() === needle);
}

/**
 * Normalizes a value: canonical option label where one matches, the trimmed
 * value otherwise.
 */
export function canonicalValue(topic: TemplateTopic, value: string, slug: string): string {
  return matchOption(topic, value, slug) ?? value.trim();
}

/**
 * Removes case-insensitive duplicates, keeping the first spelling.
 */
export function dedupeValues(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}
