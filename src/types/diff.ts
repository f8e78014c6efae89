/**
 * Snapshot diff types
 */

import type { DuplicateType, FieldDefinition, TypeKind, Visibility } from './architecture.js';

export type DiffGranularity = 'type' | 'method';

export interface TypeEntity {
  entity: 'type';
  identity: string;
  kind: TypeKind;
  visibility: Visibility;
  fields: FieldDefinition[];
  traits: string[];
  methods: Record<string, string>; // method key -> signature
}

export interface MethodEntity {
  entity: 'method';
  identity: string;
  owner: string;
  name: string;
  trait: string | null;
  signature: string;
}

export type DiffEntity = TypeEntity | MethodEntity;

export interface SetChange {
  added: string[];
  removed: string[];
  changed: string[];
}

export interface ValueChange {
  before: string;
  after: string;
}

export interface ChangeDetail {
  kind?: ValueChange;
  visibility?: ValueChange;
  signature?: ValueChange;
  fields: SetChange;
  methods: SetChange;
  traits: SetChange;
}

export interface ModifiedEntry {
  before: DiffEntity;
  after: DiffEntity;
  changes: ChangeDetail;
}

/**
 * Types each snapshot left out of its registry because they are defined
 * more than once; they take no part in the comparison.
 */
export interface SkippedDuplicates {
  before: DuplicateType[];
  after: DuplicateType[];
}

export interface DiffResult {
  granularity: DiffGranularity;
  added: Record<string, DiffEntity>;
  removed: Record<string, DiffEntity>;
  modified: Record<string, ModifiedEntry>;
  unchanged: string[];
  skipped: SkippedDuplicates;
}
