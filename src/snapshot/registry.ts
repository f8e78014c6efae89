/**
 * Snapshot assembly: merge per-file units, detect duplicate qualified names
 * and build the registry used for resolution
 */

import type {
  ArchitectureSnapshot,
  DuplicateLocation,
  DuplicateType,
  SourceUnit,
} from '../types/index.js';

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Merge step. Must run after every unit is extracted: units are ordered by
 * file path first, so the outcome never depends on completion order.
 */
export function createSnapshot(root: string, units: Iterable<SourceUnit>): ArchitectureSnapshot {
  const sorted = Array.from(units).sort((a, b) => compareStrings(a.filePath, b.filePath));

  const declared = new Map<string, DuplicateLocation[]>();
  for (const unit of sorted) {
    for (const type of unit.types) {
      const locations = declared.get(type.qualifiedName) ?? [];
      locations.push({ filePath: unit.filePath, line: type.location.startLine });
      declared.set(type.qualifiedName, locations);
    }
  }

  const registry = new Map<string, string>();
  const duplicates: DuplicateType[] = [];

  for (const qualifiedName of Array.from(declared.keys()).sort(compareStrings)) {
    const locations = declared.get(qualifiedName) ?? [];
    const [first] = locations;
    if (locations.length === 1 && first) {
      registry.set(qualifiedName, first.filePath);
    } else if (locations.length > 1) {
      duplicates.push({ qualifiedName, locations });
    }
  }

  return {
    root,
    units: new Map(sorted.map(unit => [unit.filePath, unit])),
    registry,
    duplicates,
  };
}
