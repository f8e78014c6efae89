/**
 * Abbreviated (connections) view of a relationship graph
 */

import type { GraphEdge, RelationshipGraph } from '../types/index.js';
import { compareEdges, kindPrecedence } from './builder.js';

/**
 * Collapse every (source, target) pair to one unlabeled edge whose kind is
 * the highest-precedence kind among the pair, then drop isolated nodes.
 */
export function abbreviate(graph: RelationshipGraph): RelationshipGraph {
  const pairs = new Map<string, GraphEdge>();

  for (const edge of graph.edges) {
    const key = `${edge.source}\u0000${edge.target}`;
    const existing = pairs.get(key);
    if (!existing || kindPrecedence(edge.kind) < kindPrecedence(existing.kind)) {
      pairs.set(key, { source: edge.source, target: edge.target, kind: edge.kind, label: '' });
    }
  }

  const edges = Array.from(pairs.values()).sort(compareEdges);
  const connected = new Set<string>();
  for (const edge of edges) {
    connected.add(edge.source);
    connected.add(edge.target);
  }

  return {
    nodes: graph.nodes.filter(node => connected.has(node)),
    edges,
    skipped: { ...graph.skipped, duplicates: [...graph.skipped.duplicates] },
  };
}
