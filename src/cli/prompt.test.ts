import { PassThrough, Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { InvalidAnswerError } from '../synthesis/errors.js';
import type { BatchContext } from '../synthesis/session.js';
import type { Question, QuestionBatch } from '../synthesis/types.js';
import {
  AutoAnswerer,
  PROMPT_HELP,
  TerminalAnswerer,
  createInputReader,
  formatBatchHeader,
  formatQuestion,
  parseSelection,
} from './prompt.js';
import type { DisplayOptions, InputReader } from './types.js';

const plain: DisplayOptions = { colors: false, unicode: false };

const strategy: Question = {
  id: 'limits.strategy',
  topicId: 'limits.strategy',
  group: 'Limits',
  text: 'How should requests be counted?',
  options: [
    { label: 'Fixed window', description: 'Counts reset every interval', isRecommended: true },
    { label: 'Sliding window', description: '', isRecommended: false },
    { label: 'Token bucket', description: 'Allows short bursts', isRecommended: false },
  ],
  allowMultiple: false,
  allowCustom: true,
};

const scope: Question = {
  id: 'limits.scope',
  topicId: 'limits.scope',
  group: 'Limits',
  text: 'What is limited?',
  options: [
    { label: 'Per IP', description: '', isRecommended: false },
    { label: 'Per account', description: '', isRecommended: true },
    { label: 'Global', description: '', isRecommended: false },
  ],
  allowMultiple: true,
  allowCustom: false,
};

const notes: Question = {
  id: 'notes',
  topicId: 'notes',
  group: 'Limits',
  text: 'Anything else?',
  options: [],
  allowMultiple: false,
  allowCustom: true,
};

const context: BatchContext = {
  sessionId: 'session-1',
  title: 'Rate limiter',
  round: 2,
  batchIndex: 0,
  batchCount: 3,
};

class ScriptedReader implements InputReader {
  readonly prompts: string[] = [];
  closed = false;

  constructor(private readonly lines: (string | null)[]) {}

  readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return Promise.resolve(this.lines.shift() ?? null);
  }

  close(): void {
    this.closed = true;
  }
}

describe('parseSelection', () => {
  it('recognizes quit and help in any case', () => {
    expect(parseSelection('q', strategy)).toEqual({ kind: 'quit' });
    expect(parseSelection(' QUIT ', strategy)).toEqual({ kind: 'quit' });
    expect(parseSelection('Help', strategy)).toEqual({ kind: 'help' });
  });

  it('accepts the recommended option on empty input or r', () => {
    expect(parseSelection('', strategy)).toEqual({ kind: 'answer', values: ['Fixed window'] });
    expect(parseSelection(' r ', scope)).toEqual({ kind: 'answer', values: ['Per account'] });
  });

  it('asks for an answer when there is no recommendation', () => {
    expect(parseSelection('', notes)).toEqual({
      kind: 'invalid',
      message: 'There is no recommended option; type an answer',
    });
  });

  it('selects options by number', () => {
    expect(parseSelection('2', strategy)).toEqual({ kind: 'answer', values: ['Sliding window'] });
    expect(parseSelection('3, 1', scope)).toEqual({ kind: 'answer', values: ['Global', 'Per IP'] });
    expect(parseSelection('1,1', scope)).toEqual({ kind: 'answer', values: ['Per IP'] });
  });

  it('rejects numbers that do not fit the question', () => {
    expect(parseSelection('1,3', strategy)).toEqual({
      kind: 'invalid',
      message: 'Only one option may be chosen',
    });
    expect(parseSelection('0', scope)).toEqual({
      kind: 'invalid',
      message: 'Choose a number between 1 and 3',
    });
    expect(parseSelection('4,1', strategy)).toEqual({
      kind: 'invalid',
      message: 'Only one option may be chosen',
    });
    expect(parseSelection('1,5', scope)).toEqual({
      kind: 'invalid',
      message: 'Choose a number between 1 and 3',
    });
  });

  it('takes a number that names no option as a typed answer where allowed', () => {
    const limit: Question = {
      id: 'limiter.limit',
      topicId: 'limiter.limit',
      group: 'Limits',
      text: 'How many attempts are allowed?',
      options: [
        { label: '5/min', description: '', isRecommended: true },
        { label: '10/min', description: '', isRecommended: false },
        { label: '100/hour', description: '', isRecommended: false },
      ],
      allowMultiple: false,
      allowCustom: true,
    };

    expect(parseSelection('20', limit)).toEqual({ kind: 'answer', values: ['20'] });
    expect(parseSelection('2', limit)).toEqual({ kind: 'answer', values: ['10/min'] });
    expect(parseSelection('3', notes)).toEqual({ kind: 'answer', values: ['3'] });
  });

  it('reads input after = as typed text', () => {
    expect(parseSelection('=2', strategy)).toEqual({ kind: 'answer', values: ['2'] });
    expect(parseSelection(' = sliding WINDOW ', strategy)).toEqual({
      kind: 'answer',
      values: ['Sliding window'],
    });
    expect(parseSelection('=', strategy)).toEqual({
      kind: 'invalid',
      message: 'Type an answer after =',
    });
    expect(parseSelection('=2', scope)).toEqual({
      kind: 'invalid',
      message: 'Choose one of the numbered options',
    });
    expect(parseSelection('=tbd', notes)).toEqual({
      kind: 'invalid',
      message: '"tbd" is not a decision; give a concrete answer',
    });
  });

  it('matches typed labels case-insensitively', () => {
    expect(parseSelection('token BUCKET', strategy)).toEqual({
      kind: 'answer',
      values: ['Token bucket'],
    });
    expect(parseSelection('per ip, global', scope)).toEqual({
      kind: 'answer',
      values: ['Per IP', 'Global'],
    });
  });

  it('keeps custom answers where they are allowed', () => {
    expect(parseSelection('Leaky bucket', strategy)).toEqual({
      kind: 'answer',
      values: ['Leaky bucket'],
    });
    expect(parseSelection('Per region', scope)).toEqual({
      kind: 'invalid',
      message: 'Choose one of the numbered options',
    });
  });

  it('refuses placeholder answers', () => {
    expect(parseSelection('TBD', strategy)).toEqual({
      kind: 'invalid',
      message: '"TBD" is not a decision; give a concrete answer',
    });
  });
});

describe('formatQuestion', () => {
  it('numbers the options and marks the recommendation', () => {
    expect(formatQuestion(strategy, plain)).toBe(
      [
        '? How should requests be counted? (or type your own)',
        '  1. Fixed window (recommended)',
        '     Counts reset every interval',
        '  2. Sliding window',
        '  3. Token bucket',
        '     Allows short bursts',
      ].join('\n')
    );
  });

  it('hints at multiple selection', () => {
    const firstLine = formatQuestion(scope, plain).split('\n')[0];
    expect(firstLine).toBe('? What is limited? (several allowed, comma-separated)');
  });

  it('uses color codes when enabled', () => {
    const text = formatQuestion(notes, { colors: true, unicode: true });
    expect(text).toBe('\x1b[36m◆\x1b[0m \x1b[1mAnything else?\x1b[0m \x1b[2m(or type your own)\x1b[0m');
  });
});

describe('formatBatchHeader', () => {
  const batch: QuestionBatch = { group: 'Limits', questions: [strategy] };

  it('shows the position within the round', () => {
    expect(formatBatchHeader(batch, context, plain)).toBe('Rate limiter - round 2 - Limits (1/3)');
  });

  it('omits the position for a single batch', () => {
    expect(
      formatBatchHeader(batch, { ...context, batchCount: 1 }, { colors: false, unicode: true })
    ).toBe('Rate limiter · round 2 · Limits');
  });
});

describe('TerminalAnswerer', () => {
  const batch: QuestionBatch = { group: 'Limits', questions: [strategy, scope] };

  it('asks each question and re-asks until the answer is usable', async () => {
    const reader = new ScriptedReader(['', 'help', 'Per region', '2,3']);
    const output: string[] = [];
    const answerer = new TerminalAnswerer(reader, (text) => output.push(text), plain);

    const answers = await answerer.answer(batch, context);

    expect(answers).toEqual({
      'limits.strategy': ['Fixed window'],
      'limits.scope': ['Per account', 'Global'],
    });
    expect(reader.prompts).toEqual(['> ', '> ', '> ', '> ']);
    expect(output[0]).toBe('\nRate limiter - round 2 - Limits (1/3)\n');
    expect(output).toContain(`${PROMPT_HELP}\n`);
    expect(output).toContain('Choose one of the numbered options\n');
  });

  it('declines the batch on quit', async () => {
    const reader = new ScriptedReader(['1', 'quit']);
    const answerer = new TerminalAnswerer(reader, () => undefined, plain);

    await expect(answerer.answer(batch, context)).resolves.toBeNull();
  });

  it('declines the batch when input ends', async () => {
    const reader = new ScriptedReader([]);
    const answerer = new TerminalAnswerer(reader, () => undefined, plain);

    await expect(answerer.answer(batch, context)).resolves.toBeNull();
  });
});

describe('AutoAnswerer', () => {
  it('accepts every recommendation and echoes it', async () => {
    const output: string[] = [];
    const answerer = new AutoAnswerer((text) => output.push(text), plain);

    const answers = await answerer.answer({ group: 'Limits', questions: [strategy, scope] });

    expect(answers).toEqual({
      'limits.strategy': ['Fixed window'],
      'limits.scope': ['Per account'],
    });
    expect(output).toEqual([
      'How should requests be counted? Fixed window\n',
      'What is limited? Per account\n',
    ]);
  });

  it('fails for questions without a recommendation', async () => {
    const answerer = new AutoAnswerer(() => undefined, plain);

    const error: unknown = await answerer
      .answer({ group: 'Limits', questions: [strategy, notes] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidAnswerError);
    expect(error).toMatchObject({
      validationDetails: [
        {
          field: 'notes',
          message: 'No recommended option to accept; answer this question interactively',
        },
      ],
    });
  });
});

describe('createInputReader', () => {
  it('reads lines and returns null once input ends', async () => {
    const input = new PassThrough();
    const written: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback): void {
        written.push(chunk.toString('utf-8'));
        callback();
      },
    });
    input.end('first\nsecond\n');

    const reader = createInputReader(input, output);
    expect(await reader.readLine('> ')).toBe('first');
    expect(await reader.readLine('> ')).toBe('second');
    expect(await reader.readLine('> ')).toBeNull();
    reader.close();

    expect(written).toEqual(['> ', '> ', '> ']);
  });
});
