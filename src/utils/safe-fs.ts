/**
 * File system access for user-supplied paths.
 *
 * Seeds, templates, configuration and session files all come from the
 * command line or configuration. Every helper here resolves its path first
 * and refuses empty paths and embedded null bytes.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';

export class PathValidationError extends Error {
  /** Path as it was given, before resolution. */
  public readonly invalidPath: string;

  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Resolves `filePath` against the working directory.
 *
 * @throws {PathValidationError} for an empty path or one with a null byte.
 */
export function validatePath(filePath: string): string {
  if (filePath === '') {
    throw new PathValidationError('Path cannot be empty', filePath);
  }
  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }
  return path.resolve(filePath);
}

/**
 * Reads a file as UTF-8.
 *
 * @throws {PathValidationError} for an unusable path; fs errors such as
 * ENOENT pass through.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  return fs.readFile(validatePath(filePath), 'utf-8');
}

/** Appends to `filePath`, creating the file on first use. */
export async function safeAppendTextFile(filePath: string, data: string): Promise<void> {
  await fs.appendFile(validatePath(filePath), data, 'utf-8');
}

/**
 * Reports whether anything is at `filePath`. Access errors read as absent.
 *
 * @throws {PathValidationError} for an unusable path.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const target = validatePath(filePath);
  return fs.access(target).then(
    () => true,
    () => false
  );
}

/** Creates `dirPath` and any missing parents; existing directories are fine. */
export async function safeMkdir(dirPath: string): Promise<void> {
  await fs.mkdir(validatePath(dirPath), { recursive: true });
}

/**
 * Lists the entries of `dirPath` with their file types, used to find
 * session directories.
 */
export async function safeReaddir(dirPath: string): Promise<Dirent[]> {
  return fs.readdir(validatePath(dirPath), { withFileTypes: true });
}

/**
 * Replaces `filePath` in one rename. The content is first written to a
 * hidden sibling named with `tempSuffix`, which is removed again if the
 * write or rename fails. Missing parent directories are created.
 */
export async function safeWriteTextFileAtomic(
  filePath: string,
  data: string,
  tempSuffix: string
): Promise<void> {
  const target = validatePath(filePath);
  const parent = path.dirname(target);
  const staging = path.join(parent, `.${path.basename(target)}-${tempSuffix}.tmp`);

  await fs.mkdir(parent, { recursive: true });
  try {
    await fs.writeFile(staging, data, 'utf-8');
    await fs.rename(staging, target);
  } catch (error) {
    await fs.rm(staging, { force: true });
    throw error;
  }
}

/** True for Node's ENOENT errors. */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
