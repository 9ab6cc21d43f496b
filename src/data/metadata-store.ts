/**
 * MetadataStore - the only writer of RevisionInfo, VersionedFileInfo and WadFileInfo.
 *
 * Wraps the repositories of a DatabaseManager with domain-shaped operations.
 * Driver failures surface as StoreUnavailableError; strict inserts that hit
 * an existing key surface as ConstraintViolationError.
 */

import type {
  FileUpdateType,
  LooseFileEntry,
  RevisionContents,
  RevisionInfo,
  WadFileEntry,
} from '../shared/types.js';
import type { DatabaseManager } from './database-manager.js';
import type { VersionedFileRow, WadFileRow } from './types.js';
import { translateSqliteError } from './sqlite-errors.js';

export interface DeleteRevisionResult {
  revisions: number;
  files: number;
  wadFiles: number;
}

export interface MetadataStore {
  /** Insert (name, date) unless present. Returns whether a row was added. */
  recordRevision(name: string, date: string): boolean;
  insertRevision(name: string, date: string): void;
  upsertFile(revision: string, name: string, crc: number, size: number): void;
  upsertWadFile(revision: string, name: string, wadName: string, crc: number, size: number): void;
  insertFile(revision: string, name: string, crc: number, size: number): void;
  insertWadFile(revision: string, name: string, wadName: string, crc: number, size: number): void;

  /** Loose files of a revision ordered by name; every iteration re-reads the store. */
  listFiles(revision: string): Iterable<LooseFileEntry>;
  /** Archive members of a revision ordered by (wadName, name); every iteration re-reads the store. */
  listWadFiles(revision: string): Iterable<WadFileEntry>;
  /** Ordered by date ascending, then capture order */
  listRevisions(): RevisionInfo[];
  /** Number of RevisionInfo rows (captures, not distinct names) */
  countRevisions(): number;
  listArchiveNames(revision: string): string[];

  hasRevision(name: string): boolean;
  getLatestRevision(): RevisionInfo | null;
  /** The newest capture with a different name that precedes the latest capture of `name` */
  getPreviousRevision(name: string): RevisionInfo | null;
  getFile(revision: string, name: string): LooseFileEntry | null;
  getWadFile(revision: string, name: string, wadName: string): WadFileEntry | null;
  checkFileUpdate(revision: string, name: string, crc: number, size: number): FileUpdateType;
  checkWadFileUpdate(
    revision: string,
    name: string,
    wadName: string,
    crc: number,
    size: number,
  ): FileUpdateType;
  countRevisionContents(revision: string): RevisionContents;

  /** Delete every loose file and archive member row of a revision name. */
  clearRevisionFiles(revision: string): number;
  /** Delete every capture of a revision name together with its file rows. */
  deleteRevision(name: string): DeleteRevisionResult;

  transaction<T>(operation: string, fn: () => T): T;
  readTransaction<T>(operation: string, fn: () => T): T;
}

export function createMetadataStore(db: DatabaseManager): MetadataStore {
  return {
    recordRevision(name: string, date: string): boolean {
      return guard('record revision', () => db.revisions.insertIfAbsent({ name, date }));
    },

    insertRevision(name: string, date: string): void {
      guard('insert revision', () => db.revisions.insert({ name, date }));
    },

    upsertFile(revision: string, name: string, crc: number, size: number): void {
      guard('upsert file', () => db.files.upsert({ crc, size, revision, name }));
    },

    upsertWadFile(revision: string, name: string, wadName: string, crc: number, size: number): void {
      guard('upsert wad file', () =>
        db.wadFiles.upsert({ crc, size, revision, name, wad_name: wadName }),
      );
    },

    insertFile(revision: string, name: string, crc: number, size: number): void {
      guard('insert file', () => db.files.insert({ crc, size, revision, name }));
    },

    insertWadFile(revision: string, name: string, wadName: string, crc: number, size: number): void {
      guard('insert wad file', () =>
        db.wadFiles.insert({ crc, size, revision, name, wad_name: wadName }),
      );
    },

    listFiles(revision: string): Iterable<LooseFileEntry> {
      return {
        [Symbol.iterator]: () =>
          streamRows(
            `list files of ${revision}`,
            () => db.files.iterateByRevision(revision),
            toLooseFileEntry,
          ),
      };
    },

    listWadFiles(revision: string): Iterable<WadFileEntry> {
      return {
        [Symbol.iterator]: () =>
          streamRows(
            `list wad files of ${revision}`,
            () => db.wadFiles.iterateByRevision(revision),
            toWadFileEntry,
          ),
      };
    },

    listRevisions(): RevisionInfo[] {
      return guard('list revisions', () => db.revisions.findAll());
    },

    countRevisions(): number {
      return guard('count revisions', () => db.revisions.count());
    },

    listArchiveNames(revision: string): string[] {
      return guard('list archives', () => db.wadFiles.findWadNames(revision));
    },

    hasRevision(name: string): boolean {
      return guard('check revision', () => db.revisions.exists(name));
    },

    getLatestRevision(): RevisionInfo | null {
      return guard('get latest revision', () => db.revisions.findLatest());
    },

    getPreviousRevision(name: string): RevisionInfo | null {
      const all = this.listRevisions();
      let index = -1;
      for (let i = all.length - 1; i >= 0; i--) {
        if (all[i]?.name === name) {
          index = i;
          break;
        }
      }
      for (let i = index - 1; i >= 0; i--) {
        const candidate = all[i];
        if (candidate && candidate.name !== name) {
          return candidate;
        }
      }
      return null;
    },

    getFile(revision: string, name: string): LooseFileEntry | null {
      const row = guard('get file', () => db.files.find(revision, name));
      return row ? toLooseFileEntry(row) : null;
    },

    getWadFile(revision: string, name: string, wadName: string): WadFileEntry | null {
      const row = guard('get wad file', () => db.wadFiles.find(revision, name, wadName));
      return row ? toWadFileEntry(row) : null;
    },

    checkFileUpdate(revision: string, name: string, crc: number, size: number): FileUpdateType {
      return compareToStored(this.getFile(revision, name), crc, size);
    },

    checkWadFileUpdate(
      revision: string,
      name: string,
      wadName: string,
      crc: number,
      size: number,
    ): FileUpdateType {
      return compareToStored(this.getWadFile(revision, name, wadName), crc, size);
    },

    countRevisionContents(revision: string): RevisionContents {
      return this.readTransaction('count revision contents', () => ({
        files: db.files.countByRevision(revision),
        wadFiles: db.wadFiles.countByRevision(revision),
        archives: db.wadFiles.findWadNames(revision).length,
      }));
    },

    clearRevisionFiles(revision: string): number {
      return guard(
        'clear revision files',
        () => db.files.deleteByRevision(revision) + db.wadFiles.deleteByRevision(revision),
      );
    },

    deleteRevision(name: string): DeleteRevisionResult {
      return db.transaction(`delete revision ${name}`, () => ({
        revisions: db.revisions.deleteByName(name),
        files: db.files.deleteByRevision(name),
        wadFiles: db.wadFiles.deleteByRevision(name),
      }));
    },

    transaction<T>(operation: string, fn: () => T): T {
      return db.transaction(operation, fn);
    },

    readTransaction<T>(operation: string, fn: () => T): T {
      return db.readTransaction(operation, fn);
    },
  };
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw translateSqliteError(err, operation);
  }
}

function* streamRows<R, T>(
  operation: string,
  open: () => IterableIterator<R>,
  map: (row: R) => T,
): Generator<T, void, undefined> {
  const rows = guard(operation, open);
  try {
    while (true) {
      const next = guard(operation, () => rows.next());
      if (next.done) return;
      yield map(next.value);
    }
  } finally {
    // Ends the statement so the connection is free again after an early break
    rows.return?.();
  }
}

function compareToStored(
  stored: LooseFileEntry | null,
  crc: number,
  size: number,
): FileUpdateType {
  if (!stored) return 'new';
  return stored.crc !== crc || stored.size !== size ? 'changed' : 'unchanged';
}

function toLooseFileEntry(row: VersionedFileRow): LooseFileEntry {
  return { name: row.name, crc: row.crc, size: row.size };
}

function toWadFileEntry(row: WadFileRow): WadFileEntry {
  return { name: row.name, wadName: row.wad_name, crc: row.crc, size: row.size };
}
