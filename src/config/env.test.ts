import { describe, expect, it } from 'vitest';
import {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should map CLARION_* variables onto config sections', () => {
      const result = readEnvOverrides({
        CLARION_INTERVIEW_MAX_ROUNDS: '3',
        CLARION_PATHS_SESSIONS: '/tmp/sessions',
        CLARION_CLI_COLORS: 'off',
      });

      expect(result.overrides).toEqual({
        interview: { max_rounds: 3 },
        paths: { sessions: '/tmp/sessions' },
        cli: { colors: false },
      });
      expect(result.appliedVars).toEqual([
        'CLARION_INTERVIEW_MAX_ROUNDS',
        'CLARION_PATHS_SESSIONS',
        'CLARION_CLI_COLORS',
      ]);
    });

    it('should treat CLARION_DEBUG as a shortcut for logging.debug', () => {
      expect(readEnvOverrides({ CLARION_DEBUG: 'YES' }).overrides.logging).toEqual({ debug: true });
    });

    it('should ignore unset, empty and unrelated variables', () => {
      const result = readEnvOverrides({
        CLARION_PATHS_TEMPLATE: '',
        CLARION_UNKNOWN: 'x',
        HOME: '/home/test',
      });
      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should throw EnvCoercionError for malformed numbers', () => {
      try {
        readEnvOverrides({ CLARION_INTERVIEW_MAX_ROUNDS: 'many' });
        expect.fail('expected EnvCoercionError');
      } catch (error) {
        expect(error).toBeInstanceOf(EnvCoercionError);
        expect(error).toMatchObject({
          envVar: 'CLARION_INTERVIEW_MAX_ROUNDS',
          rawValue: 'many',
          expectedType: 'number',
        });
      }
    });

    it('should list accepted spellings for malformed booleans', () => {
      expect(() => readEnvOverrides({ CLARION_CLI_UNICODE: 'maybe' })).toThrow(
        "Cannot coerce 'CLARION_CLI_UNICODE' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
      );
    });

    it('should collect errors and keep going when asked', () => {
      const result = readEnvOverrides(
        { CLARION_INTERVIEW_MAX_ROUNDS: ' ', CLARION_CLI_UNICODE: 'false' },
        { collectErrors: true }
      );

      expect(result.errors.map((e) => e.message)).toEqual([
        "Empty value for 'CLARION_INTERVIEW_MAX_ROUNDS'",
      ]);
      expect(result.overrides).toEqual({ cli: { unicode: false } });
    });
  });

  describe('applyEnvOverrides', () => {
    it('should let the environment win over the file', () => {
      const fromFile = parseConfig('[interview]\nmax_rounds = 5\nmax_questions_per_batch = 2\n');
      const config = applyEnvOverrides(fromFile, { CLARION_INTERVIEW_MAX_ROUNDS: '2' });

      expect(config.interview).toEqual({ max_rounds: 2, max_questions_per_batch: 2 });
      expect(fromFile.interview.max_rounds).toBe(5);
    });

    it('should return the defaults untouched for an empty environment', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should describe every supported variable with its type', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toContain('CLARION_INTERVIEW_MAX_ROUNDS');
      expect(docs.CLARION_DEBUG).toEqual({
        description: 'Write debug log entries (shortcut for CLARION_LOGGING_DEBUG)',
        type: 'boolean',
      });
      for (const name of Object.keys(docs)) {
        expect(name.startsWith('CLARION_')).toBe(true);
      }
    });
  });
});
