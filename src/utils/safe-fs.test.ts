import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, rm, readdir, readFile, writeFile } from 'node:fs/promises';
import { join, isAbsolute } from 'node:path';
import { tmpdir } from 'node:os';
import {
  validatePath,
  safeReadTextFile,
  safeAppendTextFile,
  safeWriteTextFileAtomic,
  safeExists,
  safeMkdir,
  safeReaddir,
  isNotFoundError,
  PathValidationError,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'clarion-safe-fs-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('keeps absolute paths', () => {
      expect(validatePath('/tmp/spec.md')).toBe('/tmp/spec.md');
    });

    it('resolves relative paths', () => {
      expect(isAbsolute(validatePath('./docs/spec.md'))).toBe(true);
    });

    it('rejects empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('rejects null bytes', () => {
      expect(() => validatePath('spec\0.md')).toThrow('Path cannot contain null bytes');
    });

    it('always yields absolute paths for safe input', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (input) => isAbsolute(validatePath(input))
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('text files', () => {
    it('appends, creating the file, and reads back', async () => {
      const file = join(tempDir, 'notes.txt');
      expect(await safeExists(file)).toBe(false);

      await safeAppendTextFile(file, 'one\n');
      await safeAppendTextFile(file, 'two\n');

      expect(await safeReadTextFile(file)).toBe('one\ntwo\n');
      expect(await safeExists(file)).toBe(true);
    });

    it('reports missing files as not-found errors', async () => {
      const error = await safeReadTextFile(join(tempDir, 'missing.md')).catch((e: unknown) => e);

      expect(isNotFoundError(error)).toBe(true);
      expect(isNotFoundError(new Error('plain'))).toBe(false);
    });
  });

  describe('directories', () => {
    it('creates nested directories and lists them', async () => {
      const nested = join(tempDir, 'a', 'b');
      await safeMkdir(nested);
      await writeFile(join(nested, 'c.md'), '# c');

      const entries = await safeReaddir(nested);
      expect(entries.map((e) => e.name)).toEqual(['c.md']);
      expect(entries[0]?.isFile()).toBe(true);
    });
  });

  describe('safeWriteTextFileAtomic', () => {
    it('creates parents and leaves no temporary file behind', async () => {
      const target = join(tempDir, 'atomic', 'deep', 'state.json');
      await safeWriteTextFileAtomic(target, '{"ok":true}', 'abc123');

      expect(await readFile(target, 'utf-8')).toBe('{"ok":true}');
      expect(await readdir(join(tempDir, 'atomic', 'deep'))).toEqual(['state.json']);
    });

    it('replaces existing content', async () => {
      const target = join(tempDir, 'replace.json');
      await safeWriteTextFileAtomic(target, 'first', 'one');
      await safeWriteTextFileAtomic(target, 'second', 'two');

      expect(await readFile(target, 'utf-8')).toBe('second');
    });
  });
});
