/**
 * Workspace inspection: facts that can be read off the target project
 * instead of being asked.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import type { DocumentTemplate } from '../template/types.js';
import { findTopic } from '../template/types.js';
import type { Logger } from '../utils/logger.js';
import { isNotFoundError, safeReadTextFile } from '../utils/safe-fs.js';
import { matchOption } from './values.js';

/** Topic resolved from the workspace's test tooling. */
export const TEST_FRAMEWORK_TOPIC = 'tests.framework';

/**
 * Test framework detected from a manifest, as an option label of
 * `tests.framework`.
 */
interface FrameworkProbe {
  /** File name relative to the workspace root. */
  readonly file: string;
  /** Returns the detected framework label, if any. */
  readonly detect: (content: string) => string | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects dependency names from the given sections of a JSON manifest.
 */
function dependencyNames(content: string, sections: readonly string[]): Set<string> {
  const names = new Set<string>();
  let manifest: unknown;
  try {
    manifest = JSON.parse(content);
  } catch {
    return names;
  }
  if (!isRecord(manifest)) {
    return names;
  }
  for (const section of sections) {
    const deps = manifest[section];
    if (isRecord(deps)) {
      for (const name of Object.keys(deps)) {
        names.add(name);
      }
    }
  }
  return names;
}

const PROBES: readonly FrameworkProbe[] = [
  {
    file: 'package.json',
    detect: (content) => {
      const deps = dependencyNames(content, ['devDependencies', 'dependencies']);
      if (deps.has('vitest')) {
        return 'Vitest';
      }
      return deps.has('jest') ? 'Jest' : undefined;
    },
  },
  {
    file: 'composer.json',
    detect: (content) => {
      const deps = dependencyNames(content, ['require-dev', 'require']);
      if (deps.has('pestphp/pest')) {
        return 'Pest';
      }
      return deps.has('phpunit/phpunit') ? 'PHPUnit' : undefined;
    },
  },
  {
    file: 'pyproject.toml',
    detect: (content) => (/\bpytest\b/.test(content) ? 'pytest' : undefined),
  },
  { file: 'pytest.ini', detect: () => 'pytest' },
  { file: 'go.mod', detect: () => 'go test' },
];

/**
 * Inspects a workspace for facts the template can use.
 *
 * Manifests are probed in a fixed order and the first detection wins.
 * Unreadable files are logged and skipped; a missing file is not an error.
 *
 * @param root - Workspace root directory.
 * @returns Values keyed by topic id. Only values that are options of the
 * template's topic are returned.
 */
export async function inspectWorkspace(
  root: string,
  template: DocumentTemplate,
  logger: Logger
): Promise<Map<string, readonly string[]>> {
  const facts = new Map<string, readonly string[]>();
  const topic = findTopic(template, TEST_FRAMEWORK_TOPIC);
  if (topic === undefined) {
    return facts;
  }

  for (const probe of PROBES) {
    const path = join(root, probe.file);
    let content: string;
    try {
      content = await safeReadTextFile(path);
    } catch (error) {
      if (!isNotFoundError(error)) {
        logger.warn('workspace_file_unreadable', {
          path,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      continue;
    }

    const detected = probe.detect(content);
    const label = detected !== undefined ? matchOption(topic, detected, '') : undefined;
    if (label !== undefined) {
      logger.debug('workspace_fact_detected', { topic: topic.id, value: label, file: probe.file });
      facts.set(topic.id, [label]);
      break;
    }
  }

  return facts;
}
