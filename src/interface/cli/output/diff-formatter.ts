/**
 * Text rendering of a DiffResult
 */

import type {
  ArchiveSummary,
  DiffResult,
  DiffScope,
  ScopeChanges,
} from '../../../shared/types.js';
import { formatCrc, plural, type Colors } from './formatter.js';

export function describeSizeChange(oldSize: number, newSize: number): string {
  if (oldSize > newSize) return `${oldSize - newSize} bytes smaller`;
  if (oldSize < newSize) return `${newSize - oldSize} bytes larger`;
  return 'size unchanged (new crc)';
}

export function scopeLabel(scope: DiffScope): string {
  return scope.kind === 'loose' ? 'Loose files' : `Archive ${scope.wadName}`;
}

export function renderDiff(result: DiffResult, c: Colors): string[] {
  const lines: string[] = [`${c.bold('Diff')} ${result.from} -> ${result.to}`];

  if (result.isEmpty) {
    lines.push('  No changes.');
    return lines;
  }

  for (const scope of result.scopes) {
    lines.push(`  ${c.bold(scopeLabel(scope.scope))}`);
    if (scope.type === 'changes') {
      lines.push(...renderChanges(scope, c));
    } else {
      lines.push(...renderArchiveSummary(scope, c));
    }
  }

  const t = result.totals;
  lines.push(
    `  ${t.added} added, ${t.removed} removed, ${t.modified} modified, ` +
      `${plural(t.archivesAdded, 'archive')} added, ${plural(t.archivesRemoved, 'archive')} removed`,
  );
  return lines;
}

function renderChanges(scope: ScopeChanges, c: Colors): string[] {
  const rows: Array<{ name: string; line: string }> = [];

  for (const f of scope.added) {
    rows.push({
      name: f.name,
      line: `    ${c.green('+')} ${f.name} ${c.dim(`crc ${formatCrc(f.crc)}, ${f.size} bytes`)}`,
    });
  }
  for (const f of scope.removed) {
    rows.push({ name: f.name, line: `    ${c.red('-')} ${f.name}` });
  }
  for (const f of scope.modified) {
    const crc = f.oldCrc === f.newCrc
      ? `crc ${formatCrc(f.newCrc)}`
      : `crc ${formatCrc(f.oldCrc)} -> ${formatCrc(f.newCrc)}`;
    rows.push({
      name: f.name,
      line: `    ${c.yellow('~')} ${f.name} ${c.dim(`${crc}, ${describeSizeChange(f.oldSize, f.newSize)}`)}`,
    });
  }

  return rows
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((r) => r.line);
}

function renderArchiveSummary(summary: ArchiveSummary, c: Colors): string[] {
  const added = summary.type === 'archive-added';
  const marker = added ? c.green('+') : c.red('-');
  const lines = [
    `    ${marker} archive ${added ? 'added' : 'removed'} ` +
      c.dim(`(${plural(summary.memberCount, 'member')}, ${summary.totalSize} bytes)`),
  ];
  for (const m of summary.members ?? []) {
    lines.push(`      ${marker} ${m.name}`);
  }
  return lines;
}
