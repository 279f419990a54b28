/**
 * Interactive and non-interactive answerers for the CLI.
 *
 * @packageDocumentation
 */

import readline from 'node:readline';
import { InvalidAnswerError } from '../synthesis/errors.js';
import type { Answerer, BatchContext } from '../synthesis/session.js';
import type { AnswerRecord, Question, QuestionBatch } from '../synthesis/types.js';
import { isAmbiguousValue } from '../synthesis/values.js';
import { terminalStyles } from './styles.js';
import type { DisplayOptions, InputReader, Writer } from './types.js';

/**
 * Outcome of interpreting one line of input.
 */
export type Selection =
  | { readonly kind: 'answer'; readonly values: readonly string[] }
  | { readonly kind: 'quit' }
  | { readonly kind: 'help' }
  | { readonly kind: 'invalid'; readonly message: string };

export const PROMPT_HELP = [
  'Answer with:',
  '  <number>        pick a numbered option',
  '  r or Enter      accept the recommended option',
  '  1,3             pick several options (where allowed)',
  '  <text>          type your own answer (where allowed)',
  '  =<text>         type your own answer even if it looks like a number',
  '  help            show this help',
  '  quit or q       stop; nothing is written and the session can be resumed',
].join('\n');

const NUMBER_LIST = /^\d+(\s*,\s*\d+)*$/;

function recommendedLabel(question: Question): string | undefined {
  return question.options.find((option) => option.isRecommended)?.label;
}

function matchLabel(question: Question, value: string): string | undefined {
  const wanted = value.toLowerCase();
  return question.options.find((option) => option.label.toLowerCase() === wanted)?.label;
}

/**
 * A lone number that names no option is taken as typed text on questions
 * that accept their own answers, so "20" can answer "How many attempts?".
 */
function selectByNumbers(question: Question, input: string): Selection {
  const numbers = [...new Set(input.split(',').map((part) => Number(part.trim())))];
  const count = question.options.length;
  const single = numbers.length === 1 && !input.includes(',');
  if (single && question.allowCustom && question.options[(numbers[0] ?? 0) - 1] === undefined) {
    return selectByText(question, input);
  }
  if (count === 0) {
    return { kind: 'invalid', message: 'This question has no numbered options; type an answer' };
  }
  if (numbers.length > 1 && !question.allowMultiple) {
    return { kind: 'invalid', message: 'Only one option may be chosen' };
  }

  const values: string[] = [];
  for (const n of numbers) {
    const option = question.options[n - 1];
    if (option === undefined) {
      return { kind: 'invalid', message: `Choose a number between 1 and ${String(count)}` };
    }
    values.push(option.label);
  }
  return { kind: 'answer', values };
}

function selectByText(question: Question, input: string): Selection {
  const parts = question.allowMultiple
    ? input.split(',').map((part) => part.trim()).filter((part) => part !== '')
    : [input];

  const values: string[] = [];
  for (const part of parts) {
    if (isAmbiguousValue(part)) {
      return { kind: 'invalid', message: `"${part}" is not a decision; give a concrete answer` };
    }
    const label = matchLabel(question, part);
    if (label === undefined && !question.allowCustom) {
      return { kind: 'invalid', message: 'Choose one of the numbered options' };
    }
    values.push(label ?? part);
  }
  return { kind: 'answer', values };
}

/**
 * Interprets a line typed in answer to a question.
 *
 * @example
 * ```typescript
 * parseSelection('2', question); // { kind: 'answer', values: ['Fixed window'] }
 * parseSelection('', question);  // the recommended option
 * parseSelection('q', question); // { kind: 'quit' }
 * parseSelection('=2', question); // { kind: 'answer', values: ['2'] } where own answers are allowed
 * ```
 */
export function parseSelection(input: string, question: Question): Selection {
  const trimmed = input.trim();
  const command = trimmed.toLowerCase();

  if (command === 'quit' || command === 'q') {
    return { kind: 'quit' };
  }
  if (command === 'help') {
    return { kind: 'help' };
  }
  if (command === '' || command === 'r') {
    const label = recommendedLabel(question);
    return label === undefined
      ? { kind: 'invalid', message: 'There is no recommended option; type an answer' }
      : { kind: 'answer', values: [label] };
  }
  if (trimmed.startsWith('=')) {
    const text = trimmed.slice(1).trim();
    if (!question.allowCustom) {
      return { kind: 'invalid', message: 'Choose one of the numbered options' };
    }
    return text === ''
      ? { kind: 'invalid', message: 'Type an answer after =' }
      : selectByText(question, text);
  }
  if (NUMBER_LIST.test(trimmed)) {
    return selectByNumbers(question, trimmed);
  }
  return selectByText(question, trimmed);
}

/**
 * Formats a question with its numbered options.
 */
export function formatQuestion(question: Question, display: DisplayOptions): string {
  const s = terminalStyles(display);
  const hints: string[] = [];
  if (question.allowMultiple) {
    hints.push('several allowed, comma-separated');
  }
  if (question.allowCustom) {
    hints.push('or type your own');
  }
  const hint = hints.length > 0 ? ` ${s.dim}(${hints.join('; ')})${s.reset}` : '';

  const lines = [`${s.cyan}${s.questionMark}${s.reset} ${s.bold}${question.text}${s.reset}${hint}`];
  question.options.forEach((option, index) => {
    const marker = option.isRecommended ? ` ${s.green}(recommended)${s.reset}` : '';
    lines.push(`  ${s.yellow}${String(index + 1)}.${s.reset} ${option.label}${marker}`);
    if (option.description !== '') {
      lines.push(`     ${s.dim}${option.description}${s.reset}`);
    }
  });
  return lines.join('\n');
}

/**
 * Formats the header shown before a batch.
 */
export function formatBatchHeader(
  batch: QuestionBatch,
  context: BatchContext,
  display: DisplayOptions
): string {
  const s = terminalStyles(display);
  const position =
    context.batchCount > 1 ? ` (${String(context.batchIndex + 1)}/${String(context.batchCount)})` : '';
  return `${s.bold}${context.title}${s.reset} ${s.separator} round ${String(context.round)} ${s.separator} ${batch.group}${position}`;
}

/**
 * Creates a line reader over a stream; input ending reads as null.
 */
export function createInputReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): InputReader {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async readLine(prompt: string): Promise<string | null> {
      output.write(prompt);
      const next = await lines.next();
      return next.done === true ? null : next.value;
    },
    close(): void {
      rl.close();
    },
  };
}

/**
 * Asks each question of a batch on the terminal, re-asking until the answer
 * is usable. `quit` or end of input declines the batch.
 */
export class TerminalAnswerer implements Answerer {
  constructor(
    private readonly reader: InputReader,
    private readonly write: Writer,
    private readonly display: DisplayOptions
  ) {}

  async answer(batch: QuestionBatch, context: BatchContext): Promise<AnswerRecord | null> {
    const s = terminalStyles(this.display);
    this.write(`\n${formatBatchHeader(batch, context, this.display)}\n`);

    const answers: Record<string, readonly string[]> = {};
    for (const question of batch.questions) {
      this.write(`\n${formatQuestion(question, this.display)}\n`);

      for (;;) {
        const line = await this.reader.readLine('> ');
        if (line === null) {
          return null;
        }
        const selection = parseSelection(line, question);
        if (selection.kind === 'quit') {
          return null;
        }
        if (selection.kind === 'help') {
          this.write(`${PROMPT_HELP}\n`);
          continue;
        }
        if (selection.kind === 'invalid') {
          this.write(`${s.red}${selection.message}${s.reset}\n`);
          continue;
        }
        answers[question.id] = selection.values;
        break;
      }
    }
    return answers;
  }
}

/**
 * Accepts the recommended option of every question without prompting.
 *
 * @throws InvalidAnswerError for questions that offer no recommendation.
 */
export class AutoAnswerer implements Answerer {
  constructor(
    private readonly write: Writer,
    private readonly display: DisplayOptions
  ) {}

  answer(batch: QuestionBatch): Promise<AnswerRecord | null> {
    const s = terminalStyles(this.display);
    const answers: Record<string, readonly string[]> = {};
    const missing = batch.questions.filter((q) => recommendedLabel(q) === undefined);

    if (missing.length > 0) {
      return Promise.reject(
        new InvalidAnswerError(
          missing.map((q) => ({
            field: q.id,
            message: 'No recommended option to accept; answer this question interactively',
          }))
        )
      );
    }

    for (const question of batch.questions) {
      const label = recommendedLabel(question) ?? '';
      answers[question.id] = [label];
      this.write(`${s.dim}${question.text}${s.reset} ${label}\n`);
    }
    return Promise.resolve(answers);
  }
}
