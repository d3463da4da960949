import { describe, test, expect } from 'vitest';
import { Logger, isLogLevel } from '../utils/logger';

function createSink() {
  const lines: string[] = [];
  return {
    write(text: string) {
      lines.push(text);
      return true;
    },
    lines,
  };
}

describe('Logger', () => {
  test('creates logger with default level', () => {
    const logger = new Logger();
    expect(logger.getLevel()).toBe('warn');
  });

  test('drops messages below the configured level', () => {
    const sink = createSink();
    const logger = new Logger('info', sink);

    logger.debug('hidden');
    logger.info('shown');

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO \] shown\n$/);
  });

  test('setLevel updates log level', () => {
    const sink = createSink();
    const logger = new Logger('error', sink);
    logger.warn('before');
    logger.setLevel('debug');
    logger.debug('after');

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toContain('[DEBUG] after');
  });

  test('redacts sensitive keys in context', () => {
    const sink = createSink();
    const logger = new Logger('debug', sink);
    logger.warn('loaded', { password: 'test-secret', nested: { Token: 'test-token' }, user: 'ops' });

    expect(sink.lines[0]).toMatch(
      / \[WARN \] loaded \{"password":"\[REDACTED\]","nested":\{"Token":"\[REDACTED\]"\},"user":"ops"\}\n$/
    );
  });

  test('redacts credentials in error messages', () => {
    const sink = createSink();
    const logger = new Logger('debug', sink);
    logger.error('failed', new Error('connect failed password=test-secret'));

    expect(sink.lines[0]).toContain('connect failed password=[REDACTED]');
    expect(sink.lines[0]).not.toContain('test-secret');
  });

  test('setSink redirects output', () => {
    const first = createSink();
    const second = createSink();
    const logger = new Logger('info', first);
    logger.setSink(second);
    logger.info('moved');

    expect(first.lines).toHaveLength(0);
    expect(second.lines).toHaveLength(1);
  });
});

describe('isLogLevel', () => {
  test('accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
