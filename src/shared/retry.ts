/**
 * Bounded retry for store operations
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { StoreUnavailableError } from './errors.js';
import type { Logger } from './logger.js';

export interface RetryOptions {
  /** Total number of attempts, including the first one (minimum 1) */
  attempts: number;
  /** Operation name for log messages */
  operation: string;
  /** Base delay between attempts; grows linearly with the attempt number */
  delayMs?: number;
  logger?: Logger;
  shouldRetry?: (err: unknown) => boolean;
}

/** Default policy: only busy/locked store errors are worth another attempt. */
export function isRetryableStoreError(err: unknown): boolean {
  return err instanceof StoreUnavailableError && err.retryable;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T> | T,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const delayMs = options.delayMs ?? 50;
  const shouldRetry = options.shouldRetry ?? isRetryableStoreError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= attempts || !shouldRetry(err)) {
        throw err;
      }
      options.logger?.warn(
        `${options.operation} failed (attempt ${attempt}/${attempts}), retrying: ${err instanceof Error ? err.message : String(err)}`,
      );
      if (delayMs > 0) {
        await sleep(delayMs * attempt);
      }
    }
  }
}
