/**
 * Loads document templates from disk.
 *
 * @packageDocumentation
 */

import { fileURLToPath } from 'node:url';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { parseTemplate, TemplateParseError } from './parser.js';
import type { DocumentTemplate } from './types.js';

/**
 * Path of the template bundled with clarion.
 *
 * Resolved relative to this module so it works from `src/` under the test
 * runner and from `dist/` after a build.
 */
export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL('../../templates/spec.toml', import.meta.url)
);

/**
 * Reads and parses a template file.
 *
 * @param templatePath - Path of a TOML template. Defaults to the bundled one.
 * @returns The validated template.
 * @throws TemplateParseError if the file cannot be read or is invalid.
 */
export async function loadTemplate(templatePath?: string): Promise<DocumentTemplate> {
  const path = templatePath ?? DEFAULT_TEMPLATE_PATH;
  let content: string;

  try {
    content = await safeReadTextFile(path);
  } catch (error) {
    const fileError = error instanceof Error ? error : new Error(String(error));
    throw new TemplateParseError(
      `Failed to read template "${path}": ${fileError.message}`,
      fileError
    );
  }

  try {
    return parseTemplate(content);
  } catch (error) {
    if (error instanceof TemplateParseError) {
      throw new TemplateParseError(`Invalid template "${path}": ${error.message}`, error);
    }
    throw error;
  }
}
