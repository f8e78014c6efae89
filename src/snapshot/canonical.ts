/**
 * Canonical ordering of snapshot contents
 */

import type {
  ArchitectureSnapshot,
  CallSite,
  ImplBlock,
  Import,
  Method,
  SourceUnit,
  TypeDefinition,
} from '../types/index.js';
import { compareStrings, createSnapshot } from './registry.js';

/**
 * Types by name, impls by (target, trait), methods by name, imports by
 * (path, alias), call sites by (line, callee). Fields keep declaration order.
 */
export function canonicalizeUnit(unit: SourceUnit): SourceUnit {
  return {
    filePath: unit.filePath,
    modulePath: unit.modulePath,
    types: unit.types.map(canonicalType).sort(byTypeName),
    impls: unit.impls.map(canonicalImpl).sort(byImplKey),
    imports: unit.imports
      .map(imp => ({ path: imp.path, alias: imp.alias }))
      .sort(byImportKey),
  };
}

export function canonicalize(snapshot: ArchitectureSnapshot): ArchitectureSnapshot {
  return createSnapshot(
    snapshot.root,
    Array.from(snapshot.units.values(), canonicalizeUnit)
  );
}

/**
 * Structural equality of two snapshots; the root directory is provenance
 */
export function snapshotsEqual(a: ArchitectureSnapshot, b: ArchitectureSnapshot): boolean {
  return JSON.stringify(canonicalUnits(a)) === JSON.stringify(canonicalUnits(b));
}

function canonicalUnits(snapshot: ArchitectureSnapshot): SourceUnit[] {
  return Array.from(snapshot.units.values(), canonicalizeUnit)
    .sort((x, y) => compareStrings(x.filePath, y.filePath));
}

function canonicalType(type: TypeDefinition): TypeDefinition {
  return {
    name: type.name,
    qualifiedName: type.qualifiedName,
    kind: type.kind,
    visibility: type.visibility,
    fields: type.fields.map(f => ({ name: f.name, type: f.type })),
    location: { ...type.location },
  };
}

function canonicalImpl(impl: ImplBlock): ImplBlock {
  return {
    target: impl.target,
    trait: impl.trait,
    methods: impl.methods.map(canonicalMethod).sort((a, b) => compareStrings(a.name, b.name)),
    location: { ...impl.location },
  };
}

function canonicalMethod(method: Method): Method {
  return {
    name: method.name,
    signature: method.signature,
    returnType: method.returnType,
    visibility: method.visibility,
    calls: method.calls.map(canonicalCall).sort(byCallKey),
    location: { ...method.location },
  };
}

function canonicalCall(call: CallSite): CallSite {
  return { callee: call.callee, method: call.method, target: call.target, line: call.line };
}

function byTypeName(a: TypeDefinition, b: TypeDefinition): number {
  return compareStrings(a.name, b.name) || compareStrings(a.qualifiedName, b.qualifiedName);
}

function byImplKey(a: ImplBlock, b: ImplBlock): number {
  return compareStrings(a.target, b.target)
    || compareStrings(a.trait ?? '', b.trait ?? '')
    || a.location.startLine - b.location.startLine;
}

function byImportKey(a: Import, b: Import): number {
  return compareStrings(a.path, b.path) || compareStrings(a.alias ?? '', b.alias ?? '');
}

function byCallKey(a: CallSite, b: CallSite): number {
  return a.line - b.line || compareStrings(a.callee, b.callee);
}
