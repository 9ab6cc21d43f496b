/**
 * revtrack error hierarchy
 */

export class RevtrackError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RevtrackError';
  }
}

/** Normalize an unknown thrown value into an Error for use as a cause. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// --- Config ---

export class ConfigError extends RevtrackError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration not found: ${path}. Run 'revtrack init' first.`);
    this.name = 'ConfigNotFoundError';
  }
}

// --- Store ---

export class StoreUnavailableError extends RevtrackError {
  /** Whether the same operation may succeed if attempted again (busy or locked database). */
  public readonly retryable: boolean;

  constructor(message: string, cause?: Error, options?: { retryable?: boolean }) {
    super(message, 'STORE_UNAVAILABLE', cause);
    this.name = 'StoreUnavailableError';
    this.retryable = options?.retryable ?? false;
  }
}

export class MigrationError extends StoreUnavailableError {
  constructor(version: number, cause?: Error) {
    super(`Migration to version ${version} failed`, cause);
    this.name = 'MigrationError';
  }
}

export class ConstraintViolationError extends RevtrackError {
  constructor(
    public readonly table: string,
    public readonly key: Record<string, string>,
    cause?: Error,
  ) {
    super(
      `Constraint violation on ${table}: key ${formatKey(key)} already exists`,
      'CONSTRAINT_VIOLATION',
      cause,
    );
    this.name = 'ConstraintViolationError';
  }
}

// --- Ingestion ---

export class DuplicateRecordError extends RevtrackError {
  constructor(
    public readonly revision: string,
    public readonly key: Record<string, string>,
  ) {
    super(
      `Duplicate record in ingestion input for revision ${revision}: ${formatKey(key)}`,
      'DUPLICATE_RECORD',
    );
    this.name = 'DuplicateRecordError';
  }
}

export class InvalidRecordError extends RevtrackError {
  constructor(message: string, public readonly revision: string) {
    super(`Invalid record for revision ${revision}: ${message}`, 'INVALID_RECORD');
    this.name = 'InvalidRecordError';
  }
}

export class ManifestError extends RevtrackError {
  constructor(message: string, public readonly filepath: string, cause?: Error) {
    super(`Invalid manifest ${filepath}: ${message}`, 'MANIFEST_ERROR', cause);
    this.name = 'ManifestError';
  }
}

// --- Diff ---

export class UnknownRevisionError extends RevtrackError {
  constructor(public readonly revision: string) {
    super(`Unknown revision: ${revision}`, 'UNKNOWN_REVISION');
    this.name = 'UnknownRevisionError';
  }
}

export class CancelledError extends RevtrackError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

function formatKey(key: Record<string, string>): string {
  return Object.entries(key)
    .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
    .join(', ');
}
