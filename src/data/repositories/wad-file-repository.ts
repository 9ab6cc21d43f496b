import type { StatementCache } from '../statement-cache.js';
import type { WadFileRow } from '../types.js';
import { translateSqliteError } from '../sqlite-errors.js';

export interface WadFileRepository {
  upsert(row: WadFileRow): void;
  /** Strict insert; an existing (revision, name, wad_name) raises ConstraintViolationError. */
  insert(row: WadFileRow): void;
  find(revision: string, name: string, wadName: string): WadFileRow | null;
  /** Lazily streams the rows of a revision ordered by (wad_name, name). */
  iterateByRevision(revision: string): IterableIterator<WadFileRow>;
  findWadNames(revision: string): string[];
  deleteByRevision(revision: string): number;
  countByRevision(revision: string): number;
}

export function createWadFileRepository(
  cache: StatementCache,
): WadFileRepository {
  return {
    upsert(row: WadFileRow): void {
      const stmt = cache.get(
        'upsert_wad_file',
        `INSERT INTO WadFileInfo (crc, size, revision, name, wad_name)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(revision, name, wad_name) DO UPDATE SET
           crc = excluded.crc,
           size = excluded.size`,
      );
      stmt.run(row.crc, row.size, row.revision, row.name, row.wad_name);
    },

    insert(row: WadFileRow): void {
      const stmt = cache.get(
        'insert_wad_file',
        'INSERT INTO WadFileInfo (crc, size, revision, name, wad_name) VALUES (?, ?, ?, ?, ?)',
      );
      try {
        stmt.run(row.crc, row.size, row.revision, row.name, row.wad_name);
      } catch (err) {
        throw translateSqliteError(err, 'insert wad file', {
          table: 'WadFileInfo',
          key: { revision: row.revision, name: row.name, wad_name: row.wad_name },
        });
      }
    },

    find(revision: string, name: string, wadName: string): WadFileRow | null {
      const stmt = cache.get(
        'select_wad_file',
        `SELECT crc, size, revision, name, wad_name FROM WadFileInfo
         WHERE revision = ? AND name = ? AND wad_name = ?`,
      );
      return (stmt.get(revision, name, wadName) as WadFileRow | undefined) ?? null;
    },

    iterateByRevision(revision: string): IterableIterator<WadFileRow> {
      const stmt = cache.get(
        'select_wad_files_by_revision',
        `SELECT crc, size, revision, name, wad_name FROM WadFileInfo
         WHERE revision = ? ORDER BY wad_name ASC, name ASC`,
      );
      return stmt.iterate(revision) as IterableIterator<WadFileRow>;
    },

    findWadNames(revision: string): string[] {
      const stmt = cache.get(
        'select_wad_names_by_revision',
        `SELECT DISTINCT wad_name FROM WadFileInfo
         WHERE revision = ? ORDER BY wad_name ASC`,
      );
      return (stmt.all(revision) as Array<{ wad_name: string }>).map((r) => r.wad_name);
    },

    deleteByRevision(revision: string): number {
      const stmt = cache.get(
        'delete_wad_files_by_revision',
        'DELETE FROM WadFileInfo WHERE revision = ?',
      );
      return stmt.run(revision).changes;
    },

    countByRevision(revision: string): number {
      const stmt = cache.get(
        'count_wad_files_by_revision',
        'SELECT COUNT(*) AS cnt FROM WadFileInfo WHERE revision = ?',
      );
      return (stmt.get(revision) as { cnt: number }).cnt;
    },
  };
}
