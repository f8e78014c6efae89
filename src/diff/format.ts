/**
 * Human-readable rendering of a diff result
 */

import type { ChangeDetail, DiffResult, DuplicateType, SetChange, ValueChange } from '../types/index.js';

/**
 * Render a diff as one block per identity, `+` added, `-` removed and `~`
 * modified with the sub-changes indented below, `!` for types a snapshot
 * left out as duplicates, then a summary line.
 */
export function formatDiff(result: DiffResult): string {
  const lines: string[] = [];

  for (const identity of Object.keys(result.added)) {
    lines.push(`+ ${identity}`);
  }
  for (const identity of Object.keys(result.removed)) {
    lines.push(`- ${identity}`);
  }
  for (const [identity, entry] of Object.entries(result.modified)) {
    lines.push(`~ ${identity}`);
    lines.push(...formatChanges(entry.changes));
  }
  for (const duplicate of result.skipped.before) {
    lines.push(formatSkipped(duplicate, 'old'));
  }
  for (const duplicate of result.skipped.after) {
    lines.push(formatSkipped(duplicate, 'new'));
  }

  const skippedCount = result.skipped.before.length + result.skipped.after.length;
  const counts = [
    `${Object.keys(result.added).length} added`,
    `${Object.keys(result.removed).length} removed`,
    `${Object.keys(result.modified).length} modified`,
    `${result.unchanged.length} unchanged`,
    ...(skippedCount > 0 ? [`${skippedCount} skipped`] : []),
  ].join(', ');

  if (lines.length === 0) {
    return `No structural changes (${counts})`;
  }
  return [...lines, '', counts].join('\n');
}

/**
 * One line per duplicated type, e.g.
 * `! crate::a::X skipped in new snapshot: defined at src/a.rs:1, src/a/mod.rs:1`
 */
export function formatSkipped(duplicate: DuplicateType, side: 'old' | 'new'): string {
  const where = duplicate.locations.map(l => `${l.filePath}:${l.line}`).join(', ');
  return `! ${duplicate.qualifiedName} skipped in ${side} snapshot: defined at ${where}`;
}

function formatChanges(changes: ChangeDetail): string[] {
  const lines: string[] = [];

  if (changes.kind) lines.push(`    kind: ${formatValue(changes.kind)}`);
  if (changes.visibility) lines.push(`    visibility: ${formatValue(changes.visibility)}`);
  if (changes.signature) {
    lines.push('    signature:');
    lines.push(`      - ${changes.signature.before}`);
    lines.push(`      + ${changes.signature.after}`);
  }

  const sets: Array<[string, SetChange]> = [
    ['fields', changes.fields],
    ['methods', changes.methods],
    ['traits', changes.traits],
  ];
  for (const [label, set] of sets) {
    const parts = [
      ...set.added.map(name => `+${name}`),
      ...set.removed.map(name => `-${name}`),
      ...set.changed.map(name => `~${name}`),
    ];
    if (parts.length > 0) {
      lines.push(`    ${label}: ${parts.join(', ')}`);
    }
  }

  return lines;
}

function formatValue(change: ValueChange): string {
  return `${change.before} -> ${change.after}`;
}
