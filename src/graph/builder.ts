/**
 * Relationship graph construction
 */

import type {
  ArchitectureSnapshot,
  CallSite,
  EdgeKind,
  GraphEdge,
  Method,
  RelationshipGraph,
  SourceUnit,
} from '../types/index.js';
import { GraphError } from '../errors.js';
import { TypeResolver } from '../extractor/type-resolver.js';
import { compareStrings } from '../snapshot/registry.js';

export interface BuildGraphOptions {
  /** Build anyway when the snapshot has duplicate qualified names; they stay excluded */
  allowDuplicates?: boolean;
}

interface OwnedMethod {
  method: Method;
  unit: SourceUnit;
}

const CONSTRUCTOR_NAMES = new Set(['new', 'default', 'build', 'create', 'try_from']);
const CONSTRUCTOR_PREFIXES = ['from', 'new_', 'with_'];
const SELF_TYPE = /\bSelf\b/;

const KIND_ORDER: Record<EdgeKind, number> = {
  implements: 0,
  contains: 1,
  calls: 2,
  'state-transition': 3,
};

export function buildGraph(
  snapshot: ArchitectureSnapshot,
  options: BuildGraphOptions = {}
): RelationshipGraph {
  const duplicates = snapshot.duplicates.map(d => d.qualifiedName).sort(compareStrings);
  if (duplicates.length > 0 && !options.allowDuplicates) {
    throw new GraphError(duplicates);
  }

  const resolver = new TypeResolver(snapshot);
  const edges = new Map<string, GraphEdge>();
  const addEdge = (edge: GraphEdge): void => {
    const key = `${edge.kind}\u0000${edge.source}\u0000${edge.target}\u0000${edge.label}`;
    if (!edges.has(key)) edges.set(key, edge);
  };

  const units = Array.from(snapshot.units.values())
    .sort((a, b) => compareStrings(a.filePath, b.filePath));
  const methodsByType = collectMethods(units, resolver);
  let unresolvedCalls = 0;

  for (const unit of units) {
    for (const type of unit.types) {
      if (snapshot.registry.get(type.qualifiedName) !== unit.filePath) continue;

      for (const field of type.fields) {
        for (const ref of resolver.resolveTypeRefs(field.type, unit, type.qualifiedName)) {
          addEdge({
            source: type.qualifiedName,
            target: ref.qualifiedName,
            kind: 'contains',
            label: field.name,
            cardinality: ref.many ? 'many' : 'one',
          });
        }
      }
    }

    for (const impl of unit.impls) {
      const source = resolver.resolveType(impl.target, unit);
      if (!source) {
        unresolvedCalls += impl.methods.reduce((n, m) => n + m.calls.length, 0);
        continue;
      }

      if (impl.trait) {
        const trait = resolver.resolveType(impl.trait, unit, source);
        if (trait && trait !== source) {
          addEdge({ source, target: trait, kind: 'implements', label: '' });
        }
      }

      for (const method of impl.methods) {
        for (const call of method.calls) {
          const target = resolveCall(call, unit, source, resolver);
          if (!target) {
            unresolvedCalls++;
            continue;
          }
          if (target === source) continue;

          addEdge({ source, target, kind: 'calls', label: call.method });

          if (isStateTransition(call, target, methodsByType, resolver)) {
            addEdge({ source, target, kind: 'state-transition', label: method.name });
          }
        }
      }
    }
  }

  return {
    nodes: Array.from(snapshot.registry.keys()).sort(compareStrings),
    edges: Array.from(edges.values()).sort(compareEdges),
    skipped: { unresolvedCalls, duplicates },
  };
}

export function compareEdges(a: GraphEdge, b: GraphEdge): number {
  return compareStrings(a.source, b.source)
    || compareStrings(a.target, b.target)
    || KIND_ORDER[a.kind] - KIND_ORDER[b.kind]
    || compareStrings(a.label, b.label);
}

export function kindPrecedence(kind: EdgeKind): number {
  return KIND_ORDER[kind];
}

/**
 * Constructor-like method names: `new`, `default`, `build`, `create`,
 * `try_from`, and anything starting with `from`, `new_` or `with_`
 */
export function isConstructorName(name: string): boolean {
  return CONSTRUCTOR_NAMES.has(name) || CONSTRUCTOR_PREFIXES.some(p => name.startsWith(p));
}

function resolveCall(
  call: CallSite,
  unit: SourceUnit,
  source: string,
  resolver: TypeResolver
): string | null {
  const target = call.target ?? resolver.resolveCallee(call, unit, source);
  return target && resolver.isRegistered(target) ? target : null;
}

/**
 * A call moves the caller into a new state of `target` when it constructs
 * `target` or calls a `target` method that returns `target` itself.
 */
function isStateTransition(
  call: CallSite,
  target: string,
  methodsByType: Map<string, OwnedMethod[]>,
  resolver: TypeResolver
): boolean {
  if (isConstructorName(call.method)) return true;

  const candidates = (methodsByType.get(target) ?? []).filter(m => m.method.name === call.method);
  return candidates.some(({ method, unit }) => {
    if (!method.returnType) return false;
    if (SELF_TYPE.test(method.returnType)) return true;
    return resolver.resolveTypeRefs(method.returnType, unit, target)
      .some(ref => ref.qualifiedName === target);
  });
}

function collectMethods(units: SourceUnit[], resolver: TypeResolver): Map<string, OwnedMethod[]> {
  const byType = new Map<string, OwnedMethod[]>();
  for (const unit of units) {
    for (const impl of unit.impls) {
      const owner = resolver.resolveType(impl.target, unit);
      if (!owner) continue;
      const list = byType.get(owner) ?? [];
      list.push(...impl.methods.map(method => ({ method, unit })));
      byType.set(owner, list);
    }
  }
  return byType;
}
