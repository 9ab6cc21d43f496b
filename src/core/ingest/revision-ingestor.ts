/**
 * RevisionIngestor - writes one scanned revision into the MetadataStore.
 *
 * A revision is written in a single transaction: readers either see the
 * previous snapshot of the revision or the complete new one. Ingestions of
 * the same revision capture are serialized through a KeyedMutex; unrelated
 * revisions proceed in parallel.
 */

import type { MetadataStore, DeleteRevisionResult } from '../../data/metadata-store.js';
import type { IngestInput, IngestResult, LooseFileEntry } from '../../shared/types.js';
import {
  CancelledError,
  DuplicateRecordError,
  InvalidRecordError,
  RevtrackError,
} from '../../shared/errors.js';
import { isCalendarDate } from '../../shared/date.js';
import { withRetry } from '../../shared/retry.js';
import { createLogger, type Logger } from '../../shared/logger.js';
import { KeyedMutex } from './keyed-mutex.js';

export const MAX_CRC = 0xffffffff;

export interface RevisionIngestorOptions {
  /** Lock wait limit per ingestion attempt */
  timeoutMs?: number;
  /** Total attempts for a busy store, including the first */
  retryAttempts?: number;
  /** Share one mutex between ingestors working on the same store */
  mutex?: KeyedMutex;
  logger?: Logger;
}

export interface IngestOptions {
  signal?: AbortSignal;
}

export function revisionLockKey(revision: string, date: string): string {
  return `${revision}@${date}`;
}

export class RevisionIngestor {
  private readonly mutex: KeyedMutex;
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: MetadataStore,
    options: RevisionIngestorOptions = {},
  ) {
    this.mutex = options.mutex ?? new KeyedMutex();
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.retryAttempts = options.retryAttempts ?? 3;
    this.logger = options.logger ?? createLogger('RevisionIngestor');
  }

  async ingest(input: IngestInput, options: IngestOptions = {}): Promise<IngestResult> {
    validateIngestInput(input);

    const { revision, date, files, wadFiles } = input;
    const key = revisionLockKey(revision, date);

    await withRetry(
      () =>
        this.mutex.runExclusive(
          key,
          () => {
            if (options.signal?.aborted) {
              throw new CancelledError(`Ingestion of ${key}`);
            }
            this.writeRevision(input);
          },
          { timeoutMs: this.timeoutMs, signal: options.signal },
        ),
      { attempts: this.retryAttempts, operation: `ingest ${key}`, logger: this.logger },
    );

    const archives = new Set(wadFiles.map((f) => f.wadName)).size;
    this.logger.info(
      `Ingested revision ${key}: ${files.length} file(s), ${wadFiles.length} archive member(s) in ${archives} archive(s)`,
    );

    return {
      revision,
      date,
      files: files.length,
      wadFiles: wadFiles.length,
      archives,
      pruned: [],
    };
  }

  /**
   * Keep the `keep` most recently captured revision names and delete the rest.
   * Returns the deleted names, oldest first.
   */
  async pruneRevisions(keep: number): Promise<string[]> {
    if (!Number.isInteger(keep) || keep < 1) {
      throw new RevtrackError(`keep must be a positive integer, got ${keep}`, 'INVALID_ARGUMENT');
    }

    const names = namesByLatestCapture(this.store.listRevisions());
    const doomed = names.slice(0, Math.max(0, names.length - keep));

    for (const name of doomed) {
      await this.deleteRevision(name);
    }
    return doomed;
  }

  /**
   * Delete every capture of `name` while holding the lock of each capture.
   */
  async deleteRevision(name: string): Promise<DeleteRevisionResult> {
    const keys = this.store
      .listRevisions()
      .filter((r) => r.name === name)
      .map((r) => revisionLockKey(r.name, r.date));

    const releases: Array<() => void> = [];
    try {
      for (const key of keys) {
        releases.push(await this.mutex.acquire(key, { timeoutMs: this.timeoutMs }));
      }
      const result = this.store.deleteRevision(name);
      this.logger.info(
        `Deleted revision ${name}: ${result.revisions} capture(s), ${result.files} file(s), ${result.wadFiles} archive member(s)`,
      );
      return result;
    } finally {
      for (const release of releases) release();
    }
  }

  private writeRevision(input: IngestInput): void {
    const { revision, date, files, wadFiles } = input;

    this.store.transaction(`ingest ${revisionLockKey(revision, date)}`, () => {
      this.store.recordRevision(revision, date);
      // Re-ingesting replaces the snapshot instead of merging into it
      const cleared = this.store.clearRevisionFiles(revision);
      if (cleared > 0) {
        this.logger.debug(`Replacing ${cleared} existing record(s) of ${revision}`);
      }
      for (const file of files) {
        this.store.upsertFile(revision, file.name, file.crc, file.size);
      }
      for (const file of wadFiles) {
        this.store.upsertWadFile(revision, file.name, file.wadName, file.crc, file.size);
      }
    });
  }
}

/**
 * Reject malformed input before anything is written.
 */
export function validateIngestInput(input: IngestInput): void {
  const { revision, date } = input;

  if (revision.length === 0) {
    throw new InvalidRecordError('revision name must not be empty', revision);
  }
  if (!isCalendarDate(date)) {
    throw new InvalidRecordError(`date must be a YYYY-MM-DD calendar date, got "${date}"`, revision);
  }

  const looseNames = new Set<string>();
  for (const file of input.files) {
    validateEntry(file, revision);
    if (looseNames.has(file.name)) {
      throw new DuplicateRecordError(revision, { name: file.name });
    }
    looseNames.add(file.name);
  }

  const wadKeys = new Set<string>();
  for (const file of input.wadFiles) {
    validateEntry(file, revision);
    if (file.wadName.length === 0) {
      throw new InvalidRecordError(`archive name of ${file.name} must not be empty`, revision);
    }
    const key = `${file.wadName}\u0000${file.name}`;
    if (wadKeys.has(key)) {
      throw new DuplicateRecordError(revision, { name: file.name, wadName: file.wadName });
    }
    wadKeys.add(key);
  }
}

function validateEntry(entry: LooseFileEntry, revision: string): void {
  if (entry.name.length === 0) {
    throw new InvalidRecordError('file name must not be empty', revision);
  }
  if (!Number.isInteger(entry.crc) || entry.crc < 0 || entry.crc > MAX_CRC) {
    throw new InvalidRecordError(`crc of ${entry.name} must be a 32-bit unsigned integer, got ${entry.crc}`, revision);
  }
  if (!Number.isSafeInteger(entry.size) || entry.size < 0) {
    throw new InvalidRecordError(`size of ${entry.name} must be a non-negative integer, got ${entry.size}`, revision);
  }
}

/** Distinct revision names ordered by their most recent capture, oldest first */
function namesByLatestCapture(revisions: Array<{ name: string }>): string[] {
  const lastIndex = new Map<string, number>();
  revisions.forEach((r, i) => lastIndex.set(r.name, i));
  return [...lastIndex.entries()].sort((a, b) => a[1] - b[1]).map(([name]) => name);
}
