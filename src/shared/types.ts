/**
 * revtrack shared types
 * Used across the data, core and interface layers
 */

/** Calendar date in `YYYY-MM-DD` form */
export type CalendarDate = string;

// --- Revision ---

export interface RevisionInfo {
  name: string;
  date: CalendarDate;
}

// --- File records ---

/** A loose (non-archived) file observed at a revision */
export interface LooseFileEntry {
  name: string;
  crc: number;
  size: number;
}

/** A member file of an archive ("wad") observed at a revision */
export interface WadFileEntry extends LooseFileEntry {
  wadName: string;
}

export type FileUpdateType = 'new' | 'changed' | 'unchanged';

// --- Ingestion ---

export interface IngestInput {
  revision: string;
  date: CalendarDate;
  files: LooseFileEntry[];
  wadFiles: WadFileEntry[];
}

export interface IngestResult {
  revision: string;
  date: CalendarDate;
  files: number;
  wadFiles: number;
  archives: number;
  pruned: string[];
}

// --- Diff ---

export type DiffScope =
  | { kind: 'loose' }
  | { kind: 'wad'; wadName: string };

export interface ModifiedFileEntry {
  name: string;
  oldCrc: number;
  newCrc: number;
  oldSize: number;
  newSize: number;
}

/** Per-file changes inside a scope present in both revisions */
export interface ScopeChanges {
  type: 'changes';
  scope: DiffScope;
  added: LooseFileEntry[];
  removed: LooseFileEntry[];
  modified: ModifiedFileEntry[];
}

/** An archive that has no members at all in one of the two revisions */
export interface ArchiveSummary {
  type: 'archive-added' | 'archive-removed';
  scope: { kind: 'wad'; wadName: string };
  memberCount: number;
  totalSize: number;
  /** Only filled when members were requested explicitly */
  members?: LooseFileEntry[];
}

export type ScopeDiff = ScopeChanges | ArchiveSummary;

export interface DiffTotals {
  added: number;
  removed: number;
  modified: number;
  archivesAdded: number;
  archivesRemoved: number;
}

export interface DiffResult {
  from: string;
  to: string;
  scopes: ScopeDiff[];
  totals: DiffTotals;
  isEmpty: boolean;
}

// --- Status ---

export interface RevisionContents {
  files: number;
  wadFiles: number;
  archives: number;
}

export interface StatusOutput {
  initialized: boolean;
  db_path: string;
  total_revisions: number;
  latest_revision: (RevisionInfo & RevisionContents) | null;
  db_size_bytes: number;
}
