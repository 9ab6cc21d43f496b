import type Database from 'better-sqlite3';
import type { Statement } from 'better-sqlite3';
import { translateSqliteError } from './sqlite-errors.js';

/**
 * Prepared statement cache keyed by a stable name.
 * Repositories fetch their statements through it so each SQL string is
 * compiled once per connection.
 */
export class StatementCache {
  private cache: Map<string, Statement>;
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.cache = new Map();
  }

  /**
   * Compile on first access, return the cached statement afterwards.
   * A statement that fails to compile (unknown table, closed connection)
   * surfaces as a store error naming the key.
   */
  get(key: string, sql: string): Statement {
    let stmt = this.cache.get(key);
    if (!stmt) {
      try {
        stmt = this.db.prepare(sql);
      } catch (err) {
        throw translateSqliteError(err, `prepare ${key}`);
      }
      this.cache.set(key, stmt);
    }
    return stmt;
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  /** Drop every cached statement; called when the connection closes. */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
