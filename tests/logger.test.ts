import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { abortError } from '../src/utils/abort.js';
import {
  NotFoundError,
  RetryExhaustedError,
  TimeoutError,
  TransientProviderError,
  describeError,
  summarizeIssues,
} from '../src/utils/errors.js';
import { createLogger, type LogEntry } from '../src/utils/logger.js';

describe('createLogger', () => {
  it('drops entries below the level and merges child context', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: 'info', handler: (entry) => entries.push(entry), context: { run: 1 } });

    logger.debug('hidden');
    logger.child({ provider: 'npm' }).warn('slow', { ms: 900 });

    expect(entries.map(({ level, message, context }) => ({ level, message, context }))).toEqual([
      { level: 'warn', message: 'slow', context: { run: 1, provider: 'npm', ms: 900 } },
    ]);
  });

  it('is quiet at the silent level', () => {
    const entries: LogEntry[] = [];
    createLogger({ level: 'silent', handler: (entry) => entries.push(entry) }).error('nothing');
    expect(entries).toEqual([]);
  });
});

describe('describeError', () => {
  it('keeps code and retryability of resolution errors', () => {
    expect(describeError(new NotFoundError('acme/tool', 'github'))).toEqual({
      code: 'NOT_FOUND',
      message: 'Project "acme/tool" was not found on github',
      retryable: false,
    });
    expect(describeError(new TimeoutError(100))).toEqual({
      code: 'TIMEOUT',
      message: 'Resolution did not finish within 100ms',
      retryable: true,
    });
  });

  it('wraps the last transient error on exhaustion', () => {
    const exhausted = new RetryExhaustedError(3, new TransientProviderError('github', 'HTTP 503'));
    expect(describeError(exhausted)).toEqual({
      code: 'RETRY_EXHAUSTED',
      message: 'github: gave up after 3 attempts: github: HTTP 503',
      retryable: true,
    });
  });

  it('classifies aborts and anything else', () => {
    expect(describeError(abortError('stopped')).code).toBe('ABORTED');
    expect(describeError('odd')).toEqual({ code: 'INTERNAL', message: 'odd', retryable: false });
  });
});

describe('summarizeIssues', () => {
  it('prints one path and message per issue', () => {
    const nested = z.object({ a: z.number() }).safeParse({ a: 'x' });
    const root = z.object({ a: z.number() }).safeParse('x');
    expect(nested.success || summarizeIssues(nested.error.issues)).toBe('a: Expected number, received string');
    expect(root.success || summarizeIssues(root.error.issues)).toBe('(root): Expected object, received string');
  });
});
