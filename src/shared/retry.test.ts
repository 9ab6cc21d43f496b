import { describe, it, expect, vi } from 'vitest';
import { withRetry, isRetryableStoreError } from './retry.js';
import { StoreUnavailableError } from './errors.js';
import type { Logger } from './logger.js';

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const busy = () => new StoreUnavailableError('database is locked', undefined, { retryable: true });

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { attempts: 3, operation: 'op', delayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('should retry retryable store errors until success', async () => {
    const logger = silentLogger();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(busy())
      .mockRejectedValueOnce(busy())
      .mockResolvedValue('ok');

    await expect(
      withRetry(fn, { attempts: 3, operation: 'ingest 1.0', delayMs: 0, logger }),
    ).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      'ingest 1.0 failed (attempt 1/3), retrying: database is locked',
    );
  });

  it('should give up after the configured number of attempts', async () => {
    const fn = vi.fn().mockRejectedValue(busy());

    await expect(withRetry(fn, { attempts: 2, operation: 'op', delayMs: 0 })).rejects.toThrow(
      'database is locked',
    );
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should not retry errors that are not retryable', async () => {
    const fn = vi.fn().mockRejectedValue(new StoreUnavailableError('disk full'));

    await expect(withRetry(fn, { attempts: 5, operation: 'op', delayMs: 0 })).rejects.toThrow(
      'disk full',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should honour a custom retry policy', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue(42);

    await expect(
      withRetry(fn, { attempts: 2, operation: 'op', delayMs: 0, shouldRetry: () => true }),
    ).resolves.toBe(42);
  });
});

describe('isRetryableStoreError', () => {
  it('should only accept retryable store errors', () => {
    expect(isRetryableStoreError(busy())).toBe(true);
    expect(isRetryableStoreError(new StoreUnavailableError('closed'))).toBe(false);
    expect(isRetryableStoreError(new Error('busy'))).toBe(false);
  });
});
