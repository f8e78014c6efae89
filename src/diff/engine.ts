/**
 * Structural diff of two snapshots
 */

import type {
  ArchitectureSnapshot,
  ChangeDetail,
  DiffEntity,
  DiffGranularity,
  DiffResult,
  DuplicateType,
  FieldDefinition,
  MethodEntity,
  ModifiedEntry,
  SetChange,
  TypeEntity,
} from '../types/index.js';
import { DiffIncompatibleError } from '../errors.js';
import { readSnapshot } from '../snapshot/store.js';
import { compareStrings } from '../snapshot/registry.js';
import { collectEntities } from './entities.js';

export interface DiffOptions {
  granularity?: DiffGranularity;
}

export function diff(
  oldSnapshot: ArchitectureSnapshot,
  newSnapshot: ArchitectureSnapshot,
  options: DiffOptions = {}
): DiffResult {
  const granularity = options.granularity ?? 'type';
  const before = collectEntities(oldSnapshot);
  const after = collectEntities(newSnapshot);

  const result: DiffResult = {
    granularity,
    added: {},
    removed: {},
    modified: {},
    unchanged: [],
    skipped: {
      before: oldSnapshot.duplicates.map(copyDuplicate),
      after: newSnapshot.duplicates.map(copyDuplicate),
    },
  };

  const oldTypes = granularity === 'method' ? withoutMethods(before.types) : before.types;
  const newTypes = granularity === 'method' ? withoutMethods(after.types) : after.types;
  classify(oldTypes, newTypes, compareTypes, result);

  if (granularity === 'method') {
    classify(before.methods, after.methods, compareMethods, result);
  }

  result.unchanged.sort(compareStrings);
  result.added = sortRecord(result.added);
  result.removed = sortRecord(result.removed);
  result.modified = sortRecord(result.modified);
  return result;
}

/**
 * Diff two stored snapshot directories
 */
export async function diffDirectories(
  oldDir: string,
  newDir: string,
  options: DiffOptions = {}
): Promise<DiffResult> {
  const [oldSnapshot, newSnapshot] = await Promise.all([
    readForDiff(oldDir),
    readForDiff(newDir),
  ]);
  return diff(oldSnapshot, newSnapshot, options);
}

async function readForDiff(directory: string): Promise<ArchitectureSnapshot> {
  try {
    return await readSnapshot(directory);
  } catch (error) {
    throw new DiffIncompatibleError(directory, error instanceof Error ? error : new Error(String(error)));
  }
}

function classify<T extends DiffEntity>(
  before: Map<string, T>,
  after: Map<string, T>,
  compare: (a: T, b: T) => ChangeDetail | null,
  result: DiffResult
): void {
  const identities = new Set([...before.keys(), ...after.keys()]);

  for (const identity of identities) {
    const a = before.get(identity);
    const b = after.get(identity);

    if (a && b) {
      const changes = compare(a, b);
      if (changes) {
        const entry: ModifiedEntry = { before: a, after: b, changes };
        result.modified[identity] = entry;
      } else {
        result.unchanged.push(identity);
      }
    } else if (b) {
      result.added[identity] = b;
    } else if (a) {
      result.removed[identity] = a;
    }
  }
}

function compareTypes(a: TypeEntity, b: TypeEntity): ChangeDetail | null {
  const detail: ChangeDetail = {
    fields: compareFields(a.fields, b.fields),
    methods: compareRecords(a.methods, b.methods),
    traits: compareSets(a.traits, b.traits),
  };
  if (a.kind !== b.kind) detail.kind = { before: a.kind, after: b.kind };
  if (a.visibility !== b.visibility) detail.visibility = { before: a.visibility, after: b.visibility };

  return hasChanges(detail) ? detail : null;
}

function compareMethods(a: MethodEntity, b: MethodEntity): ChangeDetail | null {
  if (a.signature === b.signature) return null;
  return {
    signature: { before: a.signature, after: b.signature },
    fields: emptySetChange(),
    methods: emptySetChange(),
    traits: emptySetChange(),
  };
}

/**
 * Fields are matched by name; declaration order is not structural
 */
function compareFields(a: FieldDefinition[], b: FieldDefinition[]): SetChange {
  const byName = (fields: FieldDefinition[]): Record<string, string> =>
    Object.fromEntries(fields.map((f): [string, string] => [f.name, f.type]));
  return compareRecords(byName(a), byName(b));
}

function compareRecords(a: Record<string, string>, b: Record<string, string>): SetChange {
  const change = emptySetChange();
  for (const key of Object.keys(b)) {
    if (!(key in a)) change.added.push(key);
    else if (a[key] !== b[key]) change.changed.push(key);
  }
  for (const key of Object.keys(a)) {
    if (!(key in b)) change.removed.push(key);
  }
  change.added.sort(compareStrings);
  change.removed.sort(compareStrings);
  change.changed.sort(compareStrings);
  return change;
}

function compareSets(a: string[], b: string[]): SetChange {
  const setA = new Set(a);
  const setB = new Set(b);
  return {
    added: b.filter(x => !setA.has(x)).sort(compareStrings),
    removed: a.filter(x => !setB.has(x)).sort(compareStrings),
    changed: [],
  };
}

function hasChanges(detail: ChangeDetail): boolean {
  const sets = [detail.fields, detail.methods, detail.traits];
  return detail.kind !== undefined
    || detail.visibility !== undefined
    || detail.signature !== undefined
    || sets.some(s => s.added.length + s.removed.length + s.changed.length > 0);
}

function emptySetChange(): SetChange {
  return { added: [], removed: [], changed: [] };
}

function copyDuplicate(duplicate: DuplicateType): DuplicateType {
  return {
    qualifiedName: duplicate.qualifiedName,
    locations: duplicate.locations.map(l => ({ filePath: l.filePath, line: l.line })),
  };
}

function withoutMethods(types: Map<string, TypeEntity>): Map<string, TypeEntity> {
  return new Map(Array.from(types, ([identity, entity]) => [identity, { ...entity, methods: {} }]));
}

function sortRecord<T>(record: Record<string, T>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort(compareStrings)) {
    const value = record[key];
    if (value !== undefined) sorted[key] = value;
  }
  return sorted;
}
