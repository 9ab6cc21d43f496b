import type { StatementCache } from '../statement-cache.js';
import type { VersionedFileRow } from '../types.js';
import { translateSqliteError } from '../sqlite-errors.js';

export interface VersionedFileRepository {
  upsert(row: VersionedFileRow): void;
  /** Strict insert; an existing (revision, name) raises ConstraintViolationError. */
  insert(row: VersionedFileRow): void;
  find(revision: string, name: string): VersionedFileRow | null;
  /** Lazily streams the rows of a revision ordered by name. */
  iterateByRevision(revision: string): IterableIterator<VersionedFileRow>;
  deleteByRevision(revision: string): number;
  countByRevision(revision: string): number;
}

export function createVersionedFileRepository(
  cache: StatementCache,
): VersionedFileRepository {
  return {
    upsert(row: VersionedFileRow): void {
      const stmt = cache.get(
        'upsert_versioned_file',
        `INSERT INTO VersionedFileInfo (crc, size, revision, name)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(revision, name) DO UPDATE SET
           crc = excluded.crc,
           size = excluded.size`,
      );
      stmt.run(row.crc, row.size, row.revision, row.name);
    },

    insert(row: VersionedFileRow): void {
      const stmt = cache.get(
        'insert_versioned_file',
        'INSERT INTO VersionedFileInfo (crc, size, revision, name) VALUES (?, ?, ?, ?)',
      );
      try {
        stmt.run(row.crc, row.size, row.revision, row.name);
      } catch (err) {
        throw translateSqliteError(err, 'insert versioned file', {
          table: 'VersionedFileInfo',
          key: { revision: row.revision, name: row.name },
        });
      }
    },

    find(revision: string, name: string): VersionedFileRow | null {
      const stmt = cache.get(
        'select_versioned_file',
        'SELECT crc, size, revision, name FROM VersionedFileInfo WHERE revision = ? AND name = ?',
      );
      return (stmt.get(revision, name) as VersionedFileRow | undefined) ?? null;
    },

    iterateByRevision(revision: string): IterableIterator<VersionedFileRow> {
      const stmt = cache.get(
        'select_versioned_files_by_revision',
        `SELECT crc, size, revision, name FROM VersionedFileInfo
         WHERE revision = ? ORDER BY name ASC`,
      );
      return stmt.iterate(revision) as IterableIterator<VersionedFileRow>;
    },

    deleteByRevision(revision: string): number {
      const stmt = cache.get(
        'delete_versioned_files_by_revision',
        'DELETE FROM VersionedFileInfo WHERE revision = ?',
      );
      return stmt.run(revision).changes;
    },

    countByRevision(revision: string): number {
      const stmt = cache.get(
        'count_versioned_files_by_revision',
        'SELECT COUNT(*) AS cnt FROM VersionedFileInfo WHERE revision = ?',
      );
      return (stmt.get(revision) as { cnt: number }).cnt;
    },
  };
}
