import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger, silentLogger } from './logger.js';

describe('Logger', () => {
  let lines: string[];
  let logger: Logger;

  function parseLine(index: number): Record<string, unknown> {
    const line = lines[index];
    if (line === undefined) {
      throw new Error(`Expected a log line at index ${String(index)}`);
    }
    const parsed: unknown = JSON.parse(line.trim());
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Expected a JSON object at index ${String(index)}`);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  beforeEach(() => {
    lines = [];
    logger = new Logger({
      component: 'TestComponent',
      sink: (line) => {
        lines.push(line);
      },
    });
  });

  it('writes one JSON line per entry with the standard fields', () => {
    logger.info('session_started', { sessionId: 'abc' });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('\n')).toBe(true);
    const entry = parseLine(0);
    expect(entry.level).toBe('info');
    expect(entry.component).toBe('TestComponent');
    expect(entry.event).toBe('session_started');
    expect(entry.data).toEqual({ sessionId: 'abc' });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('omits data when none is given', () => {
    logger.warn('hook_skipped');

    expect(parseLine(0)).not.toHaveProperty('data');
  });

  it('suppresses debug entries unless debug mode is on', () => {
    logger.debug('hidden');
    expect(lines).toHaveLength(0);

    const verbose = new Logger({
      component: 'Verbose',
      debugMode: true,
      sink: (line) => {
        lines.push(line);
      },
    });
    verbose.debug('shown', { n: 1 });

    expect(lines).toHaveLength(1);
    expect(parseLine(0).level).toBe('debug');
  });

  it('drops entries below the minimum level, in children too', () => {
    const quiet = new Logger({
      component: 'Quiet',
      debugMode: true,
      minLevel: 'warn',
      sink: (line) => {
        lines.push(line);
      },
    });
    const child = quiet.child('QuietChild');

    quiet.debug('dropped');
    quiet.info('dropped');
    child.info('dropped');
    child.warn('kept');
    quiet.error('kept');

    expect(lines).toHaveLength(2);
    expect(parseLine(0)).toMatchObject({ level: 'warn', component: 'QuietChild' });
    expect(parseLine(1)).toMatchObject({ level: 'error', component: 'Quiet' });
  });

  it('child loggers keep the sink and debug setting', () => {
    const verbose = new Logger({
      component: 'Parent',
      debugMode: true,
      sink: (line) => {
        lines.push(line);
      },
    });
    const child = verbose.child('Child');

    child.debug('child_event');

    expect(child.isDebugEnabled()).toBe(true);
    expect(parseLine(0).component).toBe('Child');
  });

  it('survives circular data', () => {
    const circular: Record<string, unknown> = { name: 'loop' };
    circular.self = circular;

    expect(() => {
      logger.error('circular', circular);
    }).not.toThrow();

    const entry = parseLine(0);
    expect(entry.event).toBe('circular');
    expect(entry.originalData).toBe('[unserializable]');
    expect(typeof entry.serializationError).toBe('string');
  });

  it('round-trips arbitrary event names', () => {
    fc.assert(
      fc.property(fc.string(), (event) => {
        lines = [];
        logger.info(event);
        return parseLine(0).event === event;
      }),
      { numRuns: 50 }
    );
  });

  describe('default sink', () => {
    let captured: string[];

    beforeEach(() => {
      captured = [];
      vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array): boolean => {
        captured.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
        return true;
      });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('writes to stderr', () => {
      new Logger({ component: 'Stderr' }).info('to_stderr');

      expect(captured).toHaveLength(1);
      expect(captured[0]).toContain('"event":"to_stderr"');
    });

    it('silentLogger writes nothing', () => {
      silentLogger.error('ignored');

      expect(captured).toHaveLength(0);
    });
  });
});
