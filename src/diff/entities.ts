/**
 * Diffable entities of a snapshot, keyed by identity
 */

import type { ArchitectureSnapshot, MethodEntity, TypeEntity } from '../types/index.js';
import { TypeResolver } from '../extractor/type-resolver.js';
import { lastSegment } from '../extractor/module-path.js';
import { genericArgsOf, typePathOf } from '../extractor/type-names.js';
import { compareStrings } from '../snapshot/registry.js';

export interface EntityIndex {
  types: Map<string, TypeEntity>;
  methods: Map<string, MethodEntity>;
}

/**
 * Method keys are `name` for inherent methods and `Trait<Args>::name` for
 * trait impl methods, so a type can carry both without collision. Impls whose
 * target does not resolve to a registered type contribute nothing.
 */
export function methodKey(name: string, trait: string | null): string {
  return trait ? `${trait}::${name}` : name;
}

export function collectEntities(snapshot: ArchitectureSnapshot): EntityIndex {
  const resolver = new TypeResolver(snapshot);
  const types = new Map<string, TypeEntity>();
  const methods = new Map<string, MethodEntity>();
  const traits = new Map<string, Set<string>>();

  for (const qualifiedName of Array.from(snapshot.registry.keys()).sort(compareStrings)) {
    const definition = resolver.getDefinition(qualifiedName);
    if (!definition) continue;
    types.set(qualifiedName, {
      entity: 'type',
      identity: qualifiedName,
      kind: definition.kind,
      visibility: definition.visibility,
      fields: definition.fields.map(f => ({ name: f.name, type: f.type })),
      traits: [],
      methods: {},
    });
    traits.set(qualifiedName, new Set());
  }

  for (const unit of snapshot.units.values()) {
    for (const impl of unit.impls) {
      const owner = resolver.resolveType(impl.target, unit);
      const entity = owner ? types.get(owner) : undefined;
      if (!owner || !entity) continue;

      // Generic arguments stay part of the trait: `From<A>` and `From<B>` differ
      const traitArgs = impl.trait ? genericArgsOf(impl.trait) : '';
      const traitName = impl.trait ? lastSegment(typePathOf(impl.trait)) + traitArgs : null;
      if (impl.trait) {
        const resolved = resolver.resolveType(impl.trait, unit, owner) ?? typePathOf(impl.trait);
        traits.get(owner)?.add(resolved + traitArgs);
      }

      for (const method of impl.methods) {
        const key = methodKey(method.name, traitName);
        const identity = `${owner}::${key}`;
        entity.methods[key] = method.signature;
        methods.set(identity, {
          entity: 'method',
          identity,
          owner,
          name: method.name,
          trait: traitName,
          signature: method.signature,
        });
      }
    }
  }

  for (const [owner, entity] of types) {
    entity.traits = Array.from(traits.get(owner) ?? []).sort(compareStrings);
    entity.methods = sortRecord(entity.methods);
  }

  return { types, methods };
}

function sortRecord(record: Record<string, string>): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(record).sort(compareStrings)) {
    const value = record[key];
    if (value !== undefined) sorted[key] = value;
  }
  return sorted;
}
