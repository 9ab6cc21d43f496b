import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { StoreUnavailableError, toError } from '../shared/errors.js';
import { StatementCache } from './statement-cache.js';
import { runMigrations } from './migrations/index.js';
import { translateSqliteError } from './sqlite-errors.js';
import {
  createRevisionRepository,
  type RevisionRepository,
} from './repositories/revision-repository.js';
import {
  createVersionedFileRepository,
  type VersionedFileRepository,
} from './repositories/versioned-file-repository.js';
import {
  createWadFileRepository,
  type WadFileRepository,
} from './repositories/wad-file-repository.js';

export const IN_MEMORY_DB = ':memory:';

export interface DatabaseManagerOptions {
  dbPath: string;
  readonly?: boolean;
  /** How long a statement waits on a locked database before failing */
  timeoutMs?: number;
}

export class DatabaseManager {
  private db: Database.Database | null = null;
  private statementCache: StatementCache | null = null;
  private readonly dbPath: string;
  private readonly readonlyMode: boolean;
  private readonly timeoutMs: number;

  // Repositories (lazy-initialized)
  private _revisionRepo: RevisionRepository | null = null;
  private _fileRepo: VersionedFileRepository | null = null;
  private _wadFileRepo: WadFileRepository | null = null;

  constructor(options: DatabaseManagerOptions) {
    this.dbPath = options.dbPath;
    this.readonlyMode = options.readonly ?? false;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  get path(): string {
    return this.dbPath;
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  /**
   * Open the connection, apply pragmas and run pending migrations.
   */
  initialize(): void {
    if (this.db) return;

    try {
      if (this.dbPath !== IN_MEMORY_DB && !this.readonlyMode) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }

      this.db = new Database(this.dbPath, {
        readonly: this.readonlyMode,
        fileMustExist: this.readonlyMode,
        timeout: this.timeoutMs,
      });

      if (!this.readonlyMode) {
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
      }
      this.db.pragma('temp_store = MEMORY');
      this.db.pragma('foreign_keys = ON');

      if (!this.readonlyMode) {
        runMigrations(this.db);
      }

      this.statementCache = new StatementCache(this.db);
    } catch (err) {
      this.db?.close();
      this.db = null;
      throw new StoreUnavailableError(
        `Failed to initialize database at ${this.dbPath}`,
        toError(err),
      );
    }
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new StoreUnavailableError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  getStatementCache(): StatementCache {
    if (!this.statementCache) {
      throw new StoreUnavailableError('Database not initialized. Call initialize() first.');
    }
    return this.statementCache;
  }

  // --- Repository accessors ---

  get revisions(): RevisionRepository {
    if (!this._revisionRepo) {
      this._revisionRepo = createRevisionRepository(this.getStatementCache());
    }
    return this._revisionRepo;
  }

  get files(): VersionedFileRepository {
    if (!this._fileRepo) {
      this._fileRepo = createVersionedFileRepository(this.getStatementCache());
    }
    return this._fileRepo;
  }

  get wadFiles(): WadFileRepository {
    if (!this._wadFileRepo) {
      this._wadFileRepo = createWadFileRepository(this.getStatementCache());
    }
    return this._wadFileRepo;
  }

  // --- Transactions ---

  /**
   * Run `fn` inside BEGIN IMMEDIATE. Any throw rolls the whole unit back.
   */
  transaction<T>(operation: string, fn: () => T): T {
    const db = this.getDb();
    try {
      return db.transaction(fn).immediate();
    } catch (err) {
      throw translateSqliteError(err, operation);
    }
  }

  /**
   * Run `fn` inside a deferred transaction so every read sees the same
   * committed snapshot.
   */
  readTransaction<T>(operation: string, fn: () => T): T {
    const db = this.getDb();
    try {
      return db.transaction(fn).deferred();
    } catch (err) {
      throw translateSqliteError(err, operation);
    }
  }

  /** Size of the database file in bytes (0 for in-memory databases) */
  getFileSize(): number {
    if (this.dbPath === IN_MEMORY_DB) return 0;
    let total = 0;
    for (const suffix of ['', '-wal']) {
      const filepath = this.dbPath + suffix;
      if (fs.existsSync(filepath)) {
        total += fs.statSync(filepath).size;
      }
    }
    return total;
  }

  /**
   * Checkpoint the WAL and close the connection. Safe to call twice.
   */
  close(): void {
    if (!this.db) return;

    try {
      this._revisionRepo = null;
      this._fileRepo = null;
      this._wadFileRepo = null;

      if (this.statementCache) {
        this.statementCache.clear();
        this.statementCache = null;
      }

      if (!this.readonlyMode && this.dbPath !== IN_MEMORY_DB) {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
      }

      this.db.close();
      this.db = null;
    } catch (err) {
      throw new StoreUnavailableError('Failed to close database', toError(err));
    }
  }
}
