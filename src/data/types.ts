/**
 * Data layer row types
 * Direct mappings of the SQLite tables
 */

import type Database from 'better-sqlite3';

/** `YYYY-MM-DD`, stored in the DATE column */
export type DateString = string;

// --- RevisionInfo ---

export interface RevisionRow {
  name: string;
  date: DateString;
}

// --- VersionedFileInfo ---

export interface VersionedFileRow {
  crc: number;
  size: number;
  revision: string;
  name: string;
}

// --- WadFileInfo ---

export interface WadFileRow {
  crc: number;
  size: number;
  revision: string;
  name: string;
  wad_name: string;
}

// --- Migration ---

export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}
