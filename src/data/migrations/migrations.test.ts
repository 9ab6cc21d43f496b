import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { getCurrentVersion, runMigrations } from './index.js';
import { MigrationError } from '../../shared/errors.js';
import type { Migration } from '../types.js';

function columnsOf(db: Database.Database, table: string): string[] {
  return (db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>).map(
    (c) => c.name,
  );
}

function primaryKeyOf(db: Database.Database, table: string): string[] {
  return (db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string; pk: number }>)
    .filter((c) => c.pk > 0)
    .sort((a, b) => a.pk - b.pk)
    .map((c) => c.name);
}

describe('Migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('should create all tables on fresh database', () => {
    runMigrations(db);

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(tables.map((t) => t.name)).toEqual([
      'RevisionInfo',
      'VersionedFileInfo',
      'WadFileInfo',
      'schema_version',
    ]);
  });

  it('should keep the persisted column layout', () => {
    runMigrations(db);

    expect(columnsOf(db, 'RevisionInfo')).toEqual(['name', 'date']);
    expect(columnsOf(db, 'VersionedFileInfo')).toEqual(['crc', 'size', 'revision', 'name']);
    expect(columnsOf(db, 'WadFileInfo')).toEqual(['crc', 'size', 'revision', 'name', 'wad_name']);
  });

  it('should declare the composite primary keys', () => {
    runMigrations(db);

    expect(primaryKeyOf(db, 'RevisionInfo')).toEqual(['name', 'date']);
    expect(primaryKeyOf(db, 'VersionedFileInfo')).toEqual(['revision', 'name']);
    expect(primaryKeyOf(db, 'WadFileInfo')).toEqual(['revision', 'name', 'wad_name']);
  });

  it('should set schema_version to 1 after initial migration', () => {
    expect(getCurrentVersion(db)).toBe(0);
    expect(runMigrations(db)).toEqual([1]);
    expect(getCurrentVersion(db)).toBe(1);
  });

  it('should be idempotent (running twice is safe)', () => {
    runMigrations(db);
    expect(runMigrations(db)).toEqual([]);

    const row = db
      .prepare('SELECT COUNT(*) AS cnt FROM schema_version')
      .get() as { cnt: number };
    expect(row.cnt).toBe(1);
  });

  it('should apply pending migrations in version order', () => {
    const order: number[] = [];
    const record = (version: number): Migration => ({
      version,
      description: `v${version}`,
      up: (conn) => {
        order.push(version);
        conn.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY, applied_at TEXT NOT NULL, description TEXT)');
        conn.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(version, 'now');
      },
    });

    expect(runMigrations(db, [record(3), record(2)])).toEqual([2, 3]);
    expect(order).toEqual([2, 3]);
  });

  it('should roll back and wrap a failing migration', () => {
    const broken: Migration = {
      version: 1,
      description: 'broken',
      up: (conn) => {
        conn.exec('CREATE TABLE half_done (id INTEGER)');
        conn.exec('THIS IS NOT SQL');
      },
    };

    expect(() => runMigrations(db, [broken])).toThrow(MigrationError);

    const leftover = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='half_done'")
      .get();
    expect(leftover).toBeUndefined();
  });

  it('should reject a duplicate RevisionInfo key', () => {
    runMigrations(db);
    const insert = db.prepare('INSERT INTO RevisionInfo (name, date) VALUES (?, ?)');
    insert.run('1.0', '2024-01-01');

    expect(() => insert.run('1.0', '2024-01-01')).toThrow();
    expect(() => insert.run('1.0', '2024-01-02')).not.toThrow();
  });
});
