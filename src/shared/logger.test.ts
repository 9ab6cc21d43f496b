import { describe, it, expect, afterEach } from 'vitest';
import { configureLogger, formatLogLine, getLogLevel } from './logger.js';

describe('formatLogLine', () => {
  const now = new Date('2024-01-02T03:04:05.000Z');

  it('should prefix the timestamp and padded level', () => {
    expect(formatLogLine('info', 'Ingested', [], now)).toBe(
      '[2024-01-02T03:04:05.000Z] INFO  Ingested',
    );
  });

  it('should append extra arguments, serializing non-strings as JSON', () => {
    expect(formatLogLine('warn', 'Retrying', ['busy', { attempt: 2 }], now)).toBe(
      '[2024-01-02T03:04:05.000Z] WARN  Retrying busy {"attempt":2}',
    );
  });
});

describe('configureLogger', () => {
  afterEach(() => {
    configureLogger({ level: 'info' });
  });

  it('should change the active log level', () => {
    configureLogger({ level: 'debug' });
    expect(getLogLevel()).toBe('debug');
  });
});
