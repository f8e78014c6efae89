/**
 * Focused subgraphs
 */

import type { RelationshipGraph } from '../types/index.js';
import { ArchscopeError } from '../errors.js';
import { lastSegment } from '../extractor/module-path.js';

export interface FilterOptions {
  /** Qualified name, or local name when it is unambiguous */
  focus: string;
  /** Maximum number of edges, in either direction, from the focus type */
  depth?: number;
}

export function findNode(graph: RelationshipGraph, name: string): string {
  if (graph.nodes.includes(name)) return name;

  const matches = graph.nodes.filter(node => lastSegment(node) === name);
  if (matches.length === 0) {
    throw new ArchscopeError(`Unknown type: ${name}`);
  }
  if (matches.length > 1) {
    throw new ArchscopeError(`Type name ${name} is ambiguous: ${matches.join(', ')}`);
  }
  return matches[0] ?? name;
}

/**
 * Restrict a graph to the nodes within `depth` edges of the focus type
 */
export function filterGraph(graph: RelationshipGraph, options: FilterOptions): RelationshipGraph {
  const focus = findNode(graph, options.focus);
  const depth = Math.max(0, options.depth ?? 1);

  const neighbours = new Map<string, Set<string>>();
  const link = (a: string, b: string): void => {
    const set = neighbours.get(a) ?? new Set<string>();
    set.add(b);
    neighbours.set(a, set);
  };
  for (const edge of graph.edges) {
    link(edge.source, edge.target);
    link(edge.target, edge.source);
  }

  const kept = new Set<string>([focus]);
  let frontier = [focus];
  for (let level = 0; level < depth && frontier.length > 0; level++) {
    const next: string[] = [];
    for (const node of frontier) {
      for (const neighbour of neighbours.get(node) ?? []) {
        if (!kept.has(neighbour)) {
          kept.add(neighbour);
          next.push(neighbour);
        }
      }
    }
    frontier = next;
  }

  return {
    nodes: graph.nodes.filter(node => kept.has(node)),
    edges: graph.edges.filter(edge => kept.has(edge.source) && kept.has(edge.target)),
    skipped: { ...graph.skipped, duplicates: [...graph.skipped.duplicates] },
  };
}
