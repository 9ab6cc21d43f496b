/**
 * Per-key mutual exclusion
 *
 * Holders of the same key run one after another in arrival order; different
 * keys never wait on each other. Entries are created on demand and dropped
 * once the last holder of a key releases it.
 */

import { CancelledError, StoreUnavailableError } from '../../shared/errors.js';

export type Release = () => void;

export interface AcquireOptions {
  /** Give up waiting after this many milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Wait for every earlier holder of `key`, then return the release function.
   * Rejects with StoreUnavailableError on timeout and CancelledError on abort;
   * in both cases later waiters are not held up by the abandoned slot.
   */
  async acquire(key: string, options: AcquireOptions = {}): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseSlot: () => void = () => {};
    const slot = new Promise<void>((resolve) => {
      releaseSlot = resolve;
    });
    const tail = previous.then(() => slot);
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    try {
      await waitForTurn(previous, key, options);
    } catch (err) {
      releaseSlot();
      throw err;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      releaseSlot();
    };
  }

  async runExclusive<T>(
    key: string,
    fn: () => Promise<T> | T,
    options: AcquireOptions = {},
  ): Promise<T> {
    const release = await this.acquire(key, options);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a holder or waiter */
  get size(): number {
    return this.tails.size;
  }
}

function waitForTurn(
  previous: Promise<void>,
  key: string,
  options: AcquireOptions,
): Promise<void> {
  const { timeoutMs, signal } = options;

  if (signal?.aborted) {
    return Promise.reject(new CancelledError(`Waiting for lock ${key}`));
  }
  if (timeoutMs === undefined && !signal) {
    return previous;
  }

  return new Promise<void>((resolve, reject) => {
    let timeoutId: ReturnType<typeof setTimeout> | null = null;

    const cleanup = () => {
      if (timeoutId !== null) clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(new CancelledError(`Waiting for lock ${key}`));
    };

    if (timeoutMs !== undefined) {
      timeoutId = setTimeout(() => {
        cleanup();
        reject(
          new StoreUnavailableError(
            `Timed out after ${timeoutMs}ms waiting for lock ${key}`,
            undefined,
            { retryable: true },
          ),
        );
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    void previous.then(() => {
      cleanup();
      resolve();
    });
  });
}
