import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { StatementCache } from '../statement-cache.js';
import { runMigrations } from '../migrations/index.js';
import { createWadFileRepository } from './wad-file-repository.js';
import type { WadFileRepository } from './wad-file-repository.js';
import { ConstraintViolationError } from '../../shared/errors.js';

describe('WadFileRepository', () => {
  let db: Database.Database;
  let cache: StatementCache;
  let repo: WadFileRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    cache = new StatementCache(db);
    repo = createWadFileRepository(cache);
  });

  afterEach(() => {
    cache.clear();
    db.close();
  });

  it('should keep the same member name in different archives apart', () => {
    repo.upsert({ revision: '1.0', name: 'map.dat', wad_name: 'a.wad', crc: 1, size: 10 });
    repo.upsert({ revision: '1.0', name: 'map.dat', wad_name: 'b.wad', crc: 2, size: 20 });

    expect(repo.find('1.0', 'map.dat', 'a.wad')?.crc).toBe(1);
    expect(repo.find('1.0', 'map.dat', 'b.wad')?.crc).toBe(2);
    expect(repo.countByRevision('1.0')).toBe(2);
  });

  it('should overwrite crc and size on upsert of an existing key', () => {
    repo.upsert({ revision: '1.0', name: 'map.dat', wad_name: 'a.wad', crc: 1, size: 10 });
    repo.upsert({ revision: '1.0', name: 'map.dat', wad_name: 'a.wad', crc: 5, size: 50 });

    expect(repo.find('1.0', 'map.dat', 'a.wad')).toEqual({
      crc: 5,
      size: 50,
      revision: '1.0',
      name: 'map.dat',
      wad_name: 'a.wad',
    });
  });

  it('should raise ConstraintViolationError on a strict duplicate insert', () => {
    repo.insert({ revision: '1.0', name: 'map.dat', wad_name: 'a.wad', crc: 1, size: 10 });

    expect(() =>
      repo.insert({ revision: '1.0', name: 'map.dat', wad_name: 'a.wad', crc: 1, size: 10 }),
    ).toThrow(
      'Constraint violation on WadFileInfo: key revision="1.0", name="map.dat", wad_name="a.wad" already exists',
    );
    expect(() =>
      repo.insert({ revision: '1.0', name: 'map.dat', wad_name: 'a.wad', crc: 1, size: 10 }),
    ).toThrow(ConstraintViolationError);
  });

  it('should stream members ordered by archive, then name', () => {
    repo.upsert({ revision: '1.0', name: 'z.dat', wad_name: 'a.wad', crc: 1, size: 1 });
    repo.upsert({ revision: '1.0', name: 'b.dat', wad_name: 'b.wad', crc: 1, size: 1 });
    repo.upsert({ revision: '1.0', name: 'a.dat', wad_name: 'a.wad', crc: 1, size: 1 });

    const keys = Array.from(repo.iterateByRevision('1.0'), (row) => `${row.wad_name}/${row.name}`);
    expect(keys).toEqual(['a.wad/a.dat', 'a.wad/z.dat', 'b.wad/b.dat']);
  });

  it('should list the archive names of one revision', () => {
    repo.upsert({ revision: '1.0', name: 'b.dat', wad_name: 'x.wad', crc: 1, size: 1 });
    repo.upsert({ revision: '1.0', name: 'a.dat', wad_name: 'x.wad', crc: 1, size: 1 });
    repo.upsert({ revision: '1.0', name: 'a.dat', wad_name: 'w.wad', crc: 1, size: 1 });
    repo.upsert({ revision: '2.0', name: 'a.dat', wad_name: 'y.wad', crc: 1, size: 1 });

    expect(repo.findWadNames('1.0')).toEqual(['w.wad', 'x.wad']);
  });

  it('should delete only the members of one revision', () => {
    repo.upsert({ revision: '1.0', name: 'a.dat', wad_name: 'x.wad', crc: 1, size: 1 });
    repo.upsert({ revision: '2.0', name: 'a.dat', wad_name: 'x.wad', crc: 1, size: 1 });

    expect(repo.deleteByRevision('1.0')).toBe(1);
    expect(repo.findWadNames('1.0')).toEqual([]);
    expect(repo.findWadNames('2.0')).toEqual(['x.wad']);
  });
});
