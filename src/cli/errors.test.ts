/**
 * Error suggestion system tests.
 */

import { describe, expect, it } from 'vitest';
import { ConfigParseError } from '../config/parser.js';
import { ConfigValidationError } from '../config/validator.js';
import {
  AbandonedSessionError,
  IncompleteStateError,
  InvalidAnswerError,
  RoundLimitError,
  UnresolvableSeedError,
} from '../synthesis/errors.js';
import { SessionPersistenceError } from '../synthesis/persistence.js';
import { TemplateParseError } from '../template/parser.js';
import { PathValidationError } from '../utils/safe-fs.js';
import {
  ABANDONED_EXIT_CODE,
  classifyError,
  displayErrorWithSuggestions,
  exitCodeFor,
  formatErrorWithSuggestions,
  getSuggestions,
} from './errors.js';
import { stripAnsi } from './styles.js';
import { ArgumentError } from './utils/args.js';

const plain = { colors: false, unicode: false };

describe('classifyError', () => {
  it('maps each failure to its category', () => {
    expect(classifyError(new UnresolvableSeedError('gone'))).toBe('unresolvable_seed');
    expect(classifyError(new PathValidationError('bad path', ''))).toBe('unresolvable_seed');
    expect(classifyError(new AbandonedSessionError('s1', 2))).toBe('abandoned');
    expect(classifyError(new InvalidAnswerError([]))).toBe('invalid_answer');
    expect(classifyError(new RoundLimitError(8, ['a']))).toBe('round_limit');
    expect(classifyError(new IncompleteStateError(['a']))).toBe('incomplete_state');
    expect(classifyError(new TemplateParseError('bad'))).toBe('template_error');
    expect(classifyError(new ConfigParseError('bad'))).toBe('config_error');
    expect(classifyError(new ConfigValidationError('bad', []))).toBe('config_error');
    expect(classifyError(new SessionPersistenceError('bad', 'not_found'))).toBe('session_error');
    expect(classifyError(new ArgumentError('bad'))).toBe('usage_error');
    expect(classifyError(new Error('other'))).toBe('unknown');
    expect(classifyError('not an error')).toBe('unknown');
  });
});

describe('exitCodeFor', () => {
  it('uses 130 for abandonment and 1 otherwise', () => {
    expect(exitCodeFor(new AbandonedSessionError('s1', 1))).toBe(ABANDONED_EXIT_CODE);
    expect(ABANDONED_EXIT_CODE).toBe(130);
    expect(exitCodeFor(new RoundLimitError(8, []))).toBe(1);
    expect(exitCodeFor(new Error('x'))).toBe(1);
  });
});

describe('getSuggestions', () => {
  it('points abandoned sessions at resume', () => {
    expect(getSuggestions(new AbandonedSessionError('session-7', 1))).toEqual([
      {
        text: 'No document was written; answers so far were saved',
        action: 'clarion resume session-7',
      },
    ]);
  });

  it('offers at least one suggestion for every category', () => {
    const errors: unknown[] = [
      new UnresolvableSeedError('gone'),
      new InvalidAnswerError([]),
      new RoundLimitError(8, []),
      new IncompleteStateError([]),
      new TemplateParseError('bad'),
      new ConfigParseError('bad'),
      new SessionPersistenceError('bad', 'file_error'),
      new ArgumentError('bad'),
      42,
    ];
    for (const error of errors) {
      expect(getSuggestions(error).length).toBeGreaterThan(0);
    }
  });
});

describe('formatErrorWithSuggestions', () => {
  it('lists answer validation details', () => {
    const error = new InvalidAnswerError([
      { field: 'limits.strategy', message: 'Value "tbd" is ambiguous' },
    ]);

    expect(formatErrorWithSuggestions(error, plain)).toBe(
      [
        'Error: Invalid answers: limits.strategy: Value "tbd" is ambiguous',
        '  - limits.strategy: Value "tbd" is ambiguous',
        '',
        'Suggestions:',
        '  1. Pick one of the numbered options or give a concrete value',
        '  2. Answer interactively instead of accepting recommendations',
        '    omit --yes',
      ].join('\n')
    );
  });

  it('names the open topics when the round limit is hit', () => {
    const text = formatErrorWithSuggestions(new RoundLimitError(2, ['a.b', 'c.d']), plain);

    expect(text.split('\n')[1]).toBe('  - Open: a.b, c.d');
  });

  it('names the file of an unresolvable reference', () => {
    const error = new UnresolvableSeedError('Cannot read seed', { seedPath: '/tmp/missing.md' });

    expect(formatErrorWithSuggestions(error, plain).split('\n').slice(0, 2)).toEqual([
      'Error: Cannot read seed',
      '  - File: /tmp/missing.md',
    ]);
  });

  it('indents multi-line actions', () => {
    const lines = formatErrorWithSuggestions(new RoundLimitError(8, []), plain).split('\n');

    expect(lines).toContain('    [interview]');
    expect(lines).toContain('    max_rounds = 12');
  });

  it('colors output when enabled', () => {
    const text = formatErrorWithSuggestions(new Error('boom'), { colors: true, unicode: true });

    expect(text.startsWith('\x1b[31mError:\x1b[0m boom')).toBe(true);
    expect(stripAnsi(text)).toBe(formatErrorWithSuggestions(new Error('boom'), plain));
  });

  it('formats non-Error values', () => {
    expect(formatErrorWithSuggestions('plain failure', plain).split('\n')[0]).toBe(
      'Error: plain failure'
    );
  });
});

describe('displayErrorWithSuggestions', () => {
  it('writes the formatted error surrounded by blank lines', () => {
    const written: string[] = [];
    const error = new SessionPersistenceError('Session "x" not found', 'not_found', {
      details: 'No state file exists at /tmp/x/state.json',
    });

    displayErrorWithSuggestions(error, plain, (text) => written.push(text));

    expect(written).toEqual([`\n${formatErrorWithSuggestions(error, plain)}\n\n`]);
    expect(written[0]).toContain('  - No state file exists at /tmp/x/state.json');
  });
});
