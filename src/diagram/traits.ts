/**
 * Trait reference diagram: every trait of a snapshot with its method
 * signatures, and an arrow wherever one trait's signatures name another
 */

import type { ArchitectureSnapshot, Method } from '../types/index.js';
import { TypeResolver } from '../extractor/type-resolver.js';
import { lastSegment } from '../extractor/module-path.js';
import { compareStrings } from '../snapshot/registry.js';
import { assignIds, escapeLabel, formatMethod, idOf } from './mermaid.js';

export interface TraitDiagramOptions {
  /** Leave out method signatures */
  light?: boolean;
}

interface TraitEntry {
  methods: Method[];
  references: Set<string>;
}

export function renderTraitDiagram(
  snapshot: ArchitectureSnapshot,
  options: TraitDiagramOptions = {}
): string {
  const traits = collectTraits(snapshot);
  const names = Array.from(traits.keys()).sort(compareStrings);
  const ids = assignIds({ nodes: names, edges: [], skipped: { unresolvedCalls: 0, duplicates: [] } });
  const lines = ['classDiagram'];

  for (const name of names) {
    const id = idOf(ids, name);
    lines.push(`  class ${id}["${escapeLabel(lastSegment(name))}"]`);
    lines.push(`  <<interface>> ${id}`);
    if (options.light) continue;
    for (const method of traits.get(name)?.methods ?? []) {
      lines.push(`  ${id} : ${formatMethod(method)}`);
    }
  }

  for (const name of names) {
    const references = Array.from(traits.get(name)?.references ?? []).sort(compareStrings);
    for (const reference of references) {
      lines.push(`  ${idOf(ids, name)} --> ${idOf(ids, reference)}`);
    }
  }

  return lines.join('\n') + '\n';
}

function collectTraits(snapshot: ArchitectureSnapshot): Map<string, TraitEntry> {
  const resolver = new TypeResolver(snapshot);
  const traits = new Map<string, TraitEntry>();

  for (const qualifiedName of snapshot.registry.keys()) {
    if (resolver.getDefinition(qualifiedName)?.kind === 'trait') {
      traits.set(qualifiedName, { methods: [], references: new Set() });
    }
  }

  // Trait bodies are stored as inherent impls on the trait itself
  for (const unit of snapshot.units.values()) {
    for (const impl of unit.impls) {
      if (impl.trait !== null) continue;
      const owner = resolver.resolveType(impl.target, unit);
      const entry = owner ? traits.get(owner) : undefined;
      if (!owner || !entry) continue;

      for (const method of impl.methods) {
        entry.methods.push(method);
        for (const path of signaturePaths(method.signature)) {
          const target = resolver.resolveType(path, unit, owner);
          if (target && target !== owner && traits.has(target)) entry.references.add(target);
        }
      }
    }
  }

  for (const entry of traits.values()) {
    entry.methods.sort((a, b) => compareStrings(a.name, b.name));
  }
  return traits;
}

function signaturePaths(signature: string): string[] {
  const withoutLifetimes = signature.replace(/'\w+/g, '');
  return Array.from(withoutLifetimes.matchAll(/[A-Za-z_]\w*(?:\s*::\s*[A-Za-z_]\w*)*/g), m => m[0]);
}
