/**
 * Translation of better-sqlite3 failures into store errors
 */

import Database from 'better-sqlite3';
import {
  ConstraintViolationError,
  RevtrackError,
  StoreUnavailableError,
  toError,
} from '../shared/errors.js';

export interface ConstraintContext {
  table: string;
  key: Record<string, string>;
}

const RETRYABLE_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED'];

export function isConstraintError(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT');
}

export function isRetryableSqliteError(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    RETRYABLE_CODES.some((code) => err.code.startsWith(code))
  );
}

/**
 * Map any error thrown by the driver onto the store taxonomy.
 * Errors that already belong to the taxonomy pass through unchanged.
 */
export function translateSqliteError(
  err: unknown,
  operation: string,
  constraint?: ConstraintContext,
): RevtrackError {
  if (err instanceof RevtrackError) {
    return err;
  }
  if (constraint && isConstraintError(err)) {
    return new ConstraintViolationError(constraint.table, constraint.key, toError(err));
  }

  const cause = toError(err);
  const code = err instanceof Database.SqliteError ? ` (${err.code})` : '';
  return new StoreUnavailableError(
    `Store operation failed: ${operation}${code}: ${cause.message}`,
    cause,
    { retryable: isRetryableSqliteError(err) },
  );
}
