/**
 * Tests for logging and redaction.
 */

import { describe, it, expect } from 'vitest';
import { ConsoleLogger, LogLevel, NoopLogger, parseLogLevel, redactSensitive } from '../src/logging.js';
import type { Logger } from '../src/logging.js';

function capture(options: { level?: LogLevel; format?: 'json' | 'pretty' } = {}) {
  const lines: string[] = [];
  const logger = new ConsoleLogger({ ...options, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('redactSensitive', () => {
  it('redacts signatures, secrets and keys in any naming style', () => {
    expect(
      redactSensitive({
        'privy-authorization-signature': 'sig',
        Authorization: 'Basic abc',
        appSecret: 'test-secret',
        private_key: 'k',
        method: 'POST',
      })
    ).toEqual({
      'privy-authorization-signature': '[REDACTED]',
      Authorization: '[REDACTED]',
      appSecret: '[REDACTED]',
      private_key: '[REDACTED]',
      method: 'POST',
    });
  });

  it('redacts nested objects but leaves arrays alone', () => {
    expect(redactSensitive({ headers: { authorization: 'x', accept: 'json' }, kinds: ['a'] })).toEqual({
      headers: { authorization: '[REDACTED]', accept: 'json' },
      kinds: ['a'],
    });
  });
});

describe('ConsoleLogger', () => {
  it('drops messages below the level', () => {
    const { logger, lines } = capture({ level: LogLevel.Warn });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines).toHaveLength(2);
  });

  it('writes JSON lines with merged, redacted context', () => {
    const { logger, lines } = capture({ format: 'json' });

    logger.child({ component: 'interceptor' }).info('signed', { signature: 'sig', signatureCount: 2 });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'INFO',
      message: 'signed',
      component: 'interceptor',
      signature: '[REDACTED]',
      signatureCount: 2,
    });
  });

  it('writes pretty lines with the level name', () => {
    const { logger, lines } = capture({ level: LogLevel.Trace });

    logger.trace('hello');

    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] TRACE: hello$/);
  });
});

describe('NoopLogger', () => {
  it('accepts every call and returns itself as child', () => {
    const logger: Logger = new NoopLogger();
    logger.error('ignored', { a: 1 });
    expect(logger.child({ a: 1 })).toBe(logger);
  });
});

describe('parseLogLevel', () => {
  it('parses names case-insensitively', () => {
    expect(parseLogLevel('WARN')).toBe(LogLevel.Warn);
    expect(parseLogLevel(' trace ')).toBe(LogLevel.Trace);
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});
