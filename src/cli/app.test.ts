/**
 * Tests for CLI context creation and config loading.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigParseError } from '../config/parser.js';
import { ConfigValidationError } from '../config/validator.js';
import { createCliApp, extractConfigPath } from './app.js';
import { ArgumentError } from './utils/args.js';

describe('extractConfigPath', () => {
  it('removes --config and its value', () => {
    expect(extractConfigPath(['new', '--config', 'a.toml', 'x'])).toEqual({
      args: ['new', 'x'],
      configPath: 'a.toml',
    });
  });

  it('accepts -c and --config=', () => {
    expect(extractConfigPath(['-c', 'a.toml']).configPath).toBe('a.toml');
    expect(extractConfigPath(['--config=b.toml', 'y'])).toEqual({
      args: ['y'],
      configPath: 'b.toml',
    });
  });

  it('leaves arguments after -- alone', () => {
    expect(extractConfigPath(['a', '--', '--config', 'c.toml'])).toEqual({
      args: ['a', '--', '--config', 'c.toml'],
      configPath: undefined,
    });
  });

  it('rejects --config without a value', () => {
    expect(() => extractConfigPath(['--config'])).toThrow(ArgumentError);
    expect(() => extractConfigPath(['--config', '--yes'])).toThrow('Option --config requires a value');
  });
});

describe('createCliApp', () => {
  let dir: string;
  const errors: string[] = [];
  const stderr = (text: string): void => {
    errors.push(text);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clarion-app-'));
    errors.length = 0;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses default values when no config file exists', async () => {
    const context = await createCliApp({ args: ['x'], cwd: dir, env: {}, stderr });

    expect(context.args).toEqual(['x']);
    expect(context.cwd).toBe(dir);
    expect(context.display).toEqual({ colors: true, unicode: true });
    expect(context.config.interview.max_rounds).toBe(8);
    expect(context.config.paths.sessions).toBe('.clarion/sessions');
  });

  it('loads settings from clarion.toml in the working directory', async () => {
    await writeFile(
      join(dir, 'clarion.toml'),
      '[cli]\ncolors = false\nunicode = false\n\n[interview]\nmax_rounds = 3\n'
    );

    const context = await createCliApp({ args: [], cwd: dir, env: {}, stderr });

    expect(context.display).toEqual({ colors: false, unicode: false });
    expect(context.config.interview.max_rounds).toBe(3);
  });

  it('loads an explicit --config file relative to the working directory', async () => {
    await writeFile(join(dir, 'custom.toml'), '[interview]\nmax_questions_per_batch = 2\n');

    const context = await createCliApp({
      args: ['--config', 'custom.toml', 'rest'],
      cwd: dir,
      env: {},
      stderr,
    });

    expect(context.args).toEqual(['rest']);
    expect(context.config.interview.max_questions_per_batch).toBe(2);
  });

  it('fails when an explicit config file is missing', async () => {
    await expect(
      createCliApp({ args: ['-c', 'missing.toml'], cwd: dir, env: {}, stderr })
    ).rejects.toThrow(ConfigParseError);
  });

  it('applies environment overrides over the file', async () => {
    await writeFile(join(dir, 'clarion.toml'), '[interview]\nmax_rounds = 3\n');

    const context = await createCliApp({
      args: [],
      cwd: dir,
      env: { CLARION_INTERVIEW_MAX_ROUNDS: '5', CLARION_CLI_COLORS: 'off' },
      stderr,
    });

    expect(context.config.interview.max_rounds).toBe(5);
    expect(context.display.colors).toBe(false);
  });

  it('rejects out-of-range settings', async () => {
    await expect(
      createCliApp({ args: [], cwd: dir, env: { CLARION_INTERVIEW_MAX_ROUNDS: '0' }, stderr })
    ).rejects.toThrow(ConfigValidationError);
  });

  it('logs only warnings and errors unless debug is on', async () => {
    const quiet = await createCliApp({ args: [], cwd: dir, env: {}, stderr });
    quiet.logger.info('hidden');
    quiet.logger.warn('shown');

    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain('"event":"shown"');
  });

  it('logs debug entries when CLARION_DEBUG is set', async () => {
    const loud = await createCliApp({ args: [], cwd: dir, env: { CLARION_DEBUG: 'true' }, stderr });
    loud.logger.debug('detail');
    loud.logger.info('milestone');

    expect(errors).toHaveLength(2);
    expect(errors[0]).toContain('"level":"debug"');
    expect(errors[1]).toContain('"event":"milestone"');
  });
});
