/**
 * Type resolver - resolves textual type and callee references against a
 * snapshot's qualified-name registry using each file's imports
 */

import type { CallSite, SourceUnit, TypeDefinition } from '../types/index.js';
import { absoluteCandidates, crateRootOf, joinPath, lastSegment, parentModule } from './module-path.js';
import { innerTypeRefs, typePathOf } from './type-names.js';

export interface ResolverSource {
  units: Map<string, SourceUnit>;
  registry: Map<string, string>;
}

export interface ResolvedRef {
  qualifiedName: string;
  many: boolean;
}

const RELATIVE_HEADS = new Set(['crate', 'self', 'super']);
const MAX_REEXPORT_DEPTH = 4;

export class TypeResolver {
  private definitions = new Map<string, { type: TypeDefinition; unit: SourceUnit }>();
  private modules = new Map<string, SourceUnit[]>();

  constructor(private source: ResolverSource) {
    for (const unit of source.units.values()) {
      const siblings = this.modules.get(unit.modulePath) ?? [];
      siblings.push(unit);
      this.modules.set(unit.modulePath, siblings);

      for (const type of unit.types) {
        if (source.registry.get(type.qualifiedName) === unit.filePath) {
          this.definitions.set(type.qualifiedName, { type, unit });
        }
      }
    }
  }

  isRegistered(qualifiedName: string): boolean {
    return this.source.registry.has(qualifiedName);
  }

  getDefinition(qualifiedName: string): TypeDefinition | undefined {
    return this.definitions.get(qualifiedName)?.type;
  }

  /**
   * Unit that declares a registered type
   */
  getDeclaringUnit(qualifiedName: string): SourceUnit | undefined {
    return this.definitions.get(qualifiedName)?.unit;
  }

  /**
   * Resolve a type path as written in `unit` to a registered qualified name.
   * `selfType` is the qualified name `Self` stands for, when inside an impl.
   */
  resolveType(text: string, unit: SourceUnit, selfType: string | null = null): string | null {
    const path = typePathOf(text);
    if (path.length === 0) return null;

    const segments = path.split('::');
    const head = segments[0] ?? '';

    if (head === 'Self') {
      return segments.length === 1 ? selfType : null;
    }

    if (RELATIVE_HEADS.has(head)) {
      return this.firstRegistered(absoluteCandidates(path, unit.modulePath));
    }

    if (segments.length === 1) {
      return this.resolveName(path, unit);
    }

    const rest = segments.slice(1);
    const candidates = this.moduleCandidates(head, unit).map(base => joinPath(base, ...rest));
    return this.firstRegistered([...candidates, ...absoluteCandidates(path, unit.modulePath)]);
  }

  /**
   * Every registered type a declared type mentions, unwrapping references and
   * wrapper generics. Collection wrappers mark the reference as `many`.
   */
  resolveTypeRefs(text: string, unit: SourceUnit, selfType: string | null = null): ResolvedRef[] {
    const resolved = new Map<string, boolean>();
    for (const ref of innerTypeRefs(text)) {
      const qualifiedName = this.resolveType(ref.path, unit, selfType);
      if (qualifiedName) {
        resolved.set(qualifiedName, (resolved.get(qualifiedName) ?? false) || ref.many);
      }
    }
    return Array.from(resolved, ([qualifiedName, many]) => ({ qualifiedName, many }));
  }

  /**
   * Resolve the type a call lands on.
   *
   * - `Type::method()` and `path::Type::method()` resolve the type segment
   * - `self.method()` lands on the enclosing type
   * - `self.field.method()` resolves the field's declared type
   * - a bare `Name(...)` is a tuple-struct constructor when `Name` is a type
   */
  resolveCallee(call: CallSite, unit: SourceUnit, selfType: string | null): string | null {
    const callee = call.callee;

    if (callee.includes('.')) {
      const parts = callee.split('.');
      if (parts[0] !== 'self' || !selfType) return null;
      if (parts.length === 2) return selfType;
      if (parts.length === 3) return this.resolveFieldType(selfType, parts[1] ?? '');
      return null;
    }

    const segments = callee.split('::');
    if (segments.length === 1) {
      return this.resolveType(callee, unit, selfType);
    }
    return this.resolveType(segments.slice(0, -1).join('::'), unit, selfType);
  }

  /**
   * First registered type mentioned by a field's declared type
   */
  resolveFieldType(ownerQualifiedName: string, fieldName: string): string | null {
    const entry = this.definitions.get(ownerQualifiedName);
    if (!entry) return null;

    const field = entry.type.fields.find(f => f.name === fieldName);
    if (!field) return null;

    const [first] = this.resolveTypeRefs(field.type, entry.unit, ownerQualifiedName);
    return first?.qualifiedName ?? null;
  }

  private resolveName(name: string, unit: SourceUnit): string | null {
    const local = unit.types.find(t => t.name === name && this.isRegistered(t.qualifiedName));
    if (local) return local.qualifiedName;

    const sameModule = joinPath(unit.modulePath, name);
    if (this.isRegistered(sameModule)) return sameModule;

    return this.resolveImported(name, unit, 0);
  }

  /**
   * Explicit imports whose local name is `name`, then glob imports
   */
  private resolveImported(name: string, unit: SourceUnit, depth: number): string | null {
    for (const imp of unit.imports) {
      if (isGlob(imp.path)) continue;
      if ((imp.alias ?? lastSegment(imp.path)) !== name) continue;
      const found = this.firstRegistered(absoluteCandidates(imp.path, unit.modulePath), depth);
      if (found) return found;
    }

    for (const imp of unit.imports) {
      if (!isGlob(imp.path)) continue;
      const base = imp.path.slice(0, -'::*'.length);
      const found = this.firstRegistered(absoluteCandidates(joinPath(base, name), unit.modulePath), depth);
      if (found) return found;
    }

    return null;
  }

  /**
   * Absolute module paths the first segment of a multi-segment path may denote
   */
  private moduleCandidates(head: string, unit: SourceUnit): string[] {
    const candidates: string[] = [];
    for (const imp of unit.imports) {
      if (isGlob(imp.path)) continue;
      if ((imp.alias ?? lastSegment(imp.path)) === head) {
        candidates.push(...absoluteCandidates(imp.path, unit.modulePath));
      }
    }
    candidates.push(joinPath(unit.modulePath, head), joinPath(crateRootOf(unit.modulePath), head), `crate::${head}`);
    return Array.from(new Set(candidates));
  }

  /**
   * First candidate that names a registered type, directly or through a
   * `use` in the candidate's parent module (`pub use self::memory::Store`)
   */
  private firstRegistered(candidates: string[], depth = 0): string | null {
    const direct = candidates.find(c => this.isRegistered(c));
    if (direct) return direct;
    if (depth >= MAX_REEXPORT_DEPTH) return null;

    for (const candidate of candidates) {
      const module = parentModule(candidate);
      if (module === candidate) continue;
      for (const unit of this.modules.get(module) ?? []) {
        const found = this.resolveImported(lastSegment(candidate), unit, depth + 1);
        if (found) return found;
      }
    }
    return null;
  }
}

function isGlob(path: string): boolean {
  return path === '*' || path.endsWith('::*');
}
