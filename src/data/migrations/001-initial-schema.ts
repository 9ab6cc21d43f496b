import type { Migration } from '../types.js';

// Table and column names are read by external report tooling; keep them stable.
const INITIAL_SCHEMA_SQL = `
-- schema_version
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER PRIMARY KEY,
    applied_at  TEXT    NOT NULL,
    description TEXT
);

-- RevisionInfo
CREATE TABLE IF NOT EXISTS RevisionInfo (
    name TEXT,
    date DATE,
    PRIMARY KEY (name, date)
);

CREATE INDEX IF NOT EXISTS idx_revision_info_date ON RevisionInfo(date);

-- VersionedFileInfo
CREATE TABLE IF NOT EXISTS VersionedFileInfo (
    crc      INTEGER,
    size     INTEGER,
    revision TEXT,
    name     TEXT,
    PRIMARY KEY (revision, name)
);

-- WadFileInfo
CREATE TABLE IF NOT EXISTS WadFileInfo (
    crc      INTEGER,
    size     INTEGER,
    revision TEXT,
    name     TEXT,
    wad_name TEXT,
    PRIMARY KEY (revision, name, wad_name)
);

CREATE INDEX IF NOT EXISTS idx_wad_file_info_wad ON WadFileInfo(revision, wad_name, name);
`;

export const migration001: Migration = {
  version: 1,
  description: 'Revision and file metadata tables',
  up: (db) => {
    db.exec(INITIAL_SCHEMA_SQL);
    db.prepare(
      'INSERT INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)',
    ).run(1, new Date().toISOString(), 'Revision and file metadata tables');
  },
};
