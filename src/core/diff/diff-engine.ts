/**
 * DiffEngine - metadata difference between two revisions
 *
 * Loose files form one scope and every archive forms its own. Within a scope
 * a file is added, removed or modified (crc or size differs); unchanged files
 * are left out. An archive without any member on one side collapses into a
 * single archive-added / archive-removed summary.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { MetadataStore } from '../../data/metadata-store.js';
import type {
  ArchiveSummary,
  DiffResult,
  DiffTotals,
  LooseFileEntry,
  ModifiedFileEntry,
  ScopeChanges,
  ScopeDiff,
  WadFileEntry,
} from '../../shared/types.js';
import { CancelledError, UnknownRevisionError } from '../../shared/errors.js';
import { createLogger, type Logger } from '../../shared/logger.js';

export interface DiffOptions {
  /** Checked before each scope; an aborted signal fails the diff with CancelledError */
  signal?: AbortSignal;
  /** List the members of whole-archive summaries */
  includeArchiveMembers?: boolean;
}

interface RevisionSnapshot {
  files: LooseFileEntry[];
  archives: Map<string, LooseFileEntry[]>;
}

export class DiffEngine {
  private readonly logger: Logger;

  constructor(
    private readonly store: MetadataStore,
    options: { logger?: Logger } = {},
  ) {
    this.logger = options.logger ?? createLogger('DiffEngine');
  }

  async diff(from: string, to: string, options: DiffOptions = {}): Promise<DiffResult> {
    const { signal } = options;
    throwIfAborted(signal, from, to);

    // Both sides come from one read transaction so a concurrent
    // re-ingestion is seen either entirely or not at all.
    const [before, after] = this.store.readTransaction(`diff ${from}..${to}`, () => {
      for (const revision of [from, to]) {
        if (!this.store.hasRevision(revision)) {
          throw new UnknownRevisionError(revision);
        }
      }
      return [this.readSnapshot(from), this.readSnapshot(to)] as const;
    });

    const scopes: ScopeDiff[] = [];

    throwIfAborted(signal, from, to);
    const loose = diffEntries(before.files, after.files);
    if (hasChanges(loose)) {
      scopes.push({ type: 'changes', scope: { kind: 'loose' }, ...loose });
    }

    const wadNames = [...new Set([...before.archives.keys(), ...after.archives.keys()])].sort(
      compareNames,
    );

    for (const wadName of wadNames) {
      await yieldToEventLoop();
      throwIfAborted(signal, from, to);

      const oldMembers = before.archives.get(wadName);
      const newMembers = after.archives.get(wadName);

      if (!oldMembers && newMembers) {
        scopes.push(summarizeArchive('archive-added', wadName, newMembers, options));
      } else if (oldMembers && !newMembers) {
        scopes.push(summarizeArchive('archive-removed', wadName, oldMembers, options));
      } else if (oldMembers && newMembers) {
        const changes = diffEntries(oldMembers, newMembers);
        if (hasChanges(changes)) {
          scopes.push({ type: 'changes', scope: { kind: 'wad', wadName }, ...changes });
        }
      }
    }

    const totals = computeTotals(scopes);
    this.logger.debug(
      `Diff ${from}..${to}: +${totals.added} -${totals.removed} ~${totals.modified}, ` +
        `archives +${totals.archivesAdded} -${totals.archivesRemoved}`,
    );

    return { from, to, scopes, totals, isEmpty: scopes.length === 0 };
  }

  private readSnapshot(revision: string): RevisionSnapshot {
    const files = Array.from(this.store.listFiles(revision));
    const archives = new Map<string, LooseFileEntry[]>();
    for (const entry of this.store.listWadFiles(revision)) {
      const members = archives.get(entry.wadName) ?? [];
      members.push(toMember(entry));
      archives.set(entry.wadName, members);
    }
    return { files, archives };
  }
}

type EntryChanges = Pick<ScopeChanges, 'added' | 'removed' | 'modified'>;

/**
 * Compare two sets of entries keyed by name. Output lists are sorted by name.
 */
export function diffEntries(before: LooseFileEntry[], after: LooseFileEntry[]): EntryChanges {
  const previous = new Map(before.map((e) => [e.name, e]));
  const seen = new Set<string>();
  const added: LooseFileEntry[] = [];
  const modified: ModifiedFileEntry[] = [];

  for (const entry of after) {
    const old = previous.get(entry.name);
    seen.add(entry.name);
    if (!old) {
      added.push(entry);
    } else if (old.crc !== entry.crc || old.size !== entry.size) {
      modified.push({
        name: entry.name,
        oldCrc: old.crc,
        newCrc: entry.crc,
        oldSize: old.size,
        newSize: entry.size,
      });
    }
  }

  const removed = before.filter((e) => !seen.has(e.name));

  return {
    added: added.sort(byName),
    removed: removed.sort(byName),
    modified: modified.sort(byName),
  };
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function byName(a: { name: string }, b: { name: string }): number {
  return compareNames(a.name, b.name);
}

function hasChanges(changes: EntryChanges): boolean {
  return changes.added.length + changes.removed.length + changes.modified.length > 0;
}

function summarizeArchive(
  type: ArchiveSummary['type'],
  wadName: string,
  members: LooseFileEntry[],
  options: DiffOptions,
): ArchiveSummary {
  const summary: ArchiveSummary = {
    type,
    scope: { kind: 'wad', wadName },
    memberCount: members.length,
    totalSize: members.reduce((sum, m) => sum + m.size, 0),
  };
  if (options.includeArchiveMembers) {
    summary.members = [...members].sort(byName);
  }
  return summary;
}

function computeTotals(scopes: ScopeDiff[]): DiffTotals {
  const totals: DiffTotals = {
    added: 0,
    removed: 0,
    modified: 0,
    archivesAdded: 0,
    archivesRemoved: 0,
  };
  for (const scope of scopes) {
    switch (scope.type) {
      case 'changes':
        totals.added += scope.added.length;
        totals.removed += scope.removed.length;
        totals.modified += scope.modified.length;
        break;
      case 'archive-added':
        totals.archivesAdded++;
        break;
      case 'archive-removed':
        totals.archivesRemoved++;
        break;
    }
  }
  return totals;
}

function toMember(entry: WadFileEntry): LooseFileEntry {
  return { name: entry.name, crc: entry.crc, size: entry.size };
}

function throwIfAborted(signal: AbortSignal | undefined, from: string, to: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`Diff ${from}..${to}`);
  }
}
