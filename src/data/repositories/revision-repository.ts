import type { StatementCache } from '../statement-cache.js';
import type { RevisionRow } from '../types.js';
import { translateSqliteError } from '../sqlite-errors.js';

export interface RevisionRepository {
  /** Insert unless (name, date) already exists. Returns whether a row was added. */
  insertIfAbsent(row: RevisionRow): boolean;
  /** Strict insert; a duplicate (name, date) raises ConstraintViolationError. */
  insert(row: RevisionRow): void;
  exists(name: string): boolean;
  /** Ordered by date, then capture order */
  findAll(): RevisionRow[];
  findLatest(): RevisionRow | null;
  deleteByName(name: string): number;
  count(): number;
}

export function createRevisionRepository(
  cache: StatementCache,
): RevisionRepository {
  return {
    insertIfAbsent(row: RevisionRow): boolean {
      const stmt = cache.get(
        'insert_revision_if_absent',
        `INSERT INTO RevisionInfo (name, date) VALUES (?, ?)
         ON CONFLICT(name, date) DO NOTHING`,
      );
      return stmt.run(row.name, row.date).changes > 0;
    },

    insert(row: RevisionRow): void {
      const stmt = cache.get(
        'insert_revision',
        'INSERT INTO RevisionInfo (name, date) VALUES (?, ?)',
      );
      try {
        stmt.run(row.name, row.date);
      } catch (err) {
        throw translateSqliteError(err, 'insert revision', {
          table: 'RevisionInfo',
          key: { name: row.name, date: row.date },
        });
      }
    },

    exists(name: string): boolean {
      const stmt = cache.get(
        'select_revision_exists',
        'SELECT 1 AS found FROM RevisionInfo WHERE name = ? LIMIT 1',
      );
      return stmt.get(name) !== undefined;
    },

    findAll(): RevisionRow[] {
      const stmt = cache.get(
        'select_all_revisions',
        'SELECT name, date FROM RevisionInfo ORDER BY date ASC, rowid ASC',
      );
      return stmt.all() as RevisionRow[];
    },

    findLatest(): RevisionRow | null {
      const stmt = cache.get(
        'select_latest_revision',
        'SELECT name, date FROM RevisionInfo ORDER BY date DESC, rowid DESC LIMIT 1',
      );
      return (stmt.get() as RevisionRow | undefined) ?? null;
    },

    deleteByName(name: string): number {
      const stmt = cache.get(
        'delete_revision_by_name',
        'DELETE FROM RevisionInfo WHERE name = ?',
      );
      return stmt.run(name).changes;
    },

    count(): number {
      const stmt = cache.get(
        'count_revisions',
        'SELECT COUNT(*) AS cnt FROM RevisionInfo',
      );
      return (stmt.get() as { cnt: number }).cnt;
    },
  };
}
