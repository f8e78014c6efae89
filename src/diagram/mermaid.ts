/**
 * Mermaid markup for relationship graphs
 */

import type {
  ArchitectureSnapshot,
  DiagramMode,
  EdgeKind,
  GraphEdge,
  Method,
  RelationshipGraph,
  TypeDefinition,
  Visibility,
} from '../types/index.js';
import { RenderMarkupError } from '../errors.js';
import { TypeResolver } from '../extractor/type-resolver.js';
import { lastSegment } from '../extractor/module-path.js';
import { splitTopLevel } from '../extractor/type-names.js';
import { abbreviate } from '../graph/abbreviate.js';

export interface RenderOptions {
  /** Supplies field and method members for class diagrams */
  snapshot?: ArchitectureSnapshot;
}

export const DIAGRAM_MODES: readonly DiagramMode[] = ['class', 'state', 'connections', 'entity'];

const CLASS_ARROWS: Record<EdgeKind, string> = {
  implements: '..|>',
  contains: '*--',
  calls: '-->',
  'state-transition': '..>',
};

const VISIBILITY_MARKERS: Record<Visibility, string> = {
  public: '+',
  crate: '~',
  restricted: '~',
  private: '-',
};

/**
 * Diagram id of a qualified name: `crate::net::Socket` -> `crate__net__Socket`
 */
export function sanitizeId(qualifiedName: string): string {
  return qualifiedName.replace(/[^A-Za-z0-9_]/g, '_').replace(/^_+|_+$/g, '');
}

export function render(
  graph: RelationshipGraph,
  mode: DiagramMode,
  options: RenderOptions = {}
): string {
  switch (mode) {
    case 'class':
      return renderClass(graph, options.snapshot);
    case 'state':
      return renderState(graph);
    case 'connections':
      return renderConnections(graph);
    case 'entity':
      return renderEntity(graph);
  }
}

function renderClass(graph: RelationshipGraph, snapshot?: ArchitectureSnapshot): string {
  const ids = assignIds(graph);
  const members = snapshot ? collectMembers(snapshot) : new Map<string, Member>();
  const lines = ['classDiagram'];

  for (const node of graph.nodes) {
    const id = idOf(ids, node);
    lines.push(`  class ${id}["${escapeLabel(lastSegment(node))}"]`);

    const member = members.get(node);
    if (!member) continue;

    if (member.definition.kind === 'trait') lines.push(`  <<interface>> ${id}`);
    if (member.definition.kind === 'enum') lines.push(`  <<enumeration>> ${id}`);

    for (const field of member.definition.fields) {
      // Variant payloads would read as method parameters
      lines.push(member.definition.kind === 'enum'
        ? `  ${id} : ${escapeMember(field.name)}`
        : `  ${id} : ${VISIBILITY_MARKERS.public}${escapeMember(field.name)} ${escapeMember(field.type)}`);
    }
    for (const method of member.methods) {
      lines.push(`  ${id} : ${formatMethod(method)}`);
    }
  }

  for (const edge of graph.edges) {
    const source = idOf(ids, edge.source);
    const target = idOf(ids, edge.target);
    const label = escapeLabel(edge.label || edge.kind);

    if (edge.kind === 'contains') {
      const many = edge.cardinality === 'many' ? '"*"' : '"1"';
      lines.push(`  ${source} "1" ${CLASS_ARROWS.contains} ${many} ${target} : ${label}`);
    } else {
      lines.push(`  ${source} ${CLASS_ARROWS[edge.kind]} ${target} : ${label}`);
    }
  }

  return lines.join('\n') + '\n';
}

function renderState(graph: RelationshipGraph): string {
  const ids = assignIds(graph);
  const lines = ['stateDiagram-v2'];

  for (const node of graph.nodes) {
    lines.push(`  state "${escapeLabel(lastSegment(node))}" as ${idOf(ids, node)}`);
  }
  for (const edge of graph.edges) {
    const label = escapeLabel(edge.label || edge.kind);
    lines.push(`  ${idOf(ids, edge.source)} --> ${idOf(ids, edge.target)} : ${label}`);
  }

  return lines.join('\n') + '\n';
}

function renderConnections(graph: RelationshipGraph): string {
  const view = abbreviate(graph);
  const ids = assignIds(view);
  const lines = ['graph LR'];

  for (const node of view.nodes) {
    lines.push(`  ${idOf(ids, node)}["${escapeLabel(lastSegment(node))}"]`);
  }
  for (const edge of view.edges) {
    lines.push(`  ${idOf(ids, edge.source)} --> ${idOf(ids, edge.target)}`);
  }

  return lines.join('\n') + '\n';
}

function renderEntity(graph: RelationshipGraph): string {
  const ids = assignIds(graph);
  const lines = ['erDiagram'];

  for (const edge of graph.edges.filter(e => e.kind === 'contains')) {
    const relation = edge.cardinality === 'many' ? '||--o{' : '||--||';
    const label = escapeLabel(edge.label || edge.kind);
    lines.push(`  ${idOf(ids, edge.source)} ${relation} ${idOf(ids, edge.target)} : "${label}"`);
  }

  return lines.join('\n') + '\n';
}

/**
 * Map every node to its diagram id, rejecting dangling edges and id collisions
 */
export function assignIds(graph: RelationshipGraph): Map<string, string> {
  const ids = new Map<string, string>();
  const owners = new Map<string, string>();

  for (const node of graph.nodes) {
    const id = sanitizeId(node);
    if (id.length === 0) {
      throw new RenderMarkupError(`Type name ${JSON.stringify(node)} has no usable diagram id`);
    }
    const owner = owners.get(id);
    if (owner !== undefined && owner !== node) {
      throw new RenderMarkupError(`Types ${owner} and ${node} both map to diagram id ${id}`);
    }
    owners.set(id, node);
    ids.set(node, id);
  }

  for (const edge of graph.edges) {
    checkEndpoint(ids, edge, edge.source);
    checkEndpoint(ids, edge, edge.target);
  }

  return ids;
}

function checkEndpoint(ids: Map<string, string>, edge: GraphEdge, endpoint: string): void {
  if (!ids.has(endpoint)) {
    throw new RenderMarkupError(
      `Edge ${edge.source} -${edge.kind}-> ${edge.target} refers to unknown node ${endpoint}`
    );
  }
}

export function idOf(ids: Map<string, string>, node: string): string {
  const id = ids.get(node);
  if (id === undefined) {
    throw new RenderMarkupError(`Unknown node ${node}`);
  }
  return id;
}

interface Member {
  definition: TypeDefinition;
  methods: Method[];
}

function collectMembers(snapshot: ArchitectureSnapshot): Map<string, Member> {
  const resolver = new TypeResolver(snapshot);
  const members = new Map<string, Member>();

  for (const qualifiedName of snapshot.registry.keys()) {
    const definition = resolver.getDefinition(qualifiedName);
    if (definition) members.set(qualifiedName, { definition, methods: [] });
  }

  for (const unit of snapshot.units.values()) {
    for (const impl of unit.impls) {
      const owner = resolver.resolveType(impl.target, unit);
      const member = owner ? members.get(owner) : undefined;
      if (member) member.methods.push(...impl.methods);
    }
  }

  for (const member of members.values()) {
    member.methods.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  return members;
}

/**
 * `pub fn new(name: String, size: u32) -> Self` -> `+new(name String, size u32) Self`
 */
export function formatMethod(method: Method): string {
  const params = parameterList(method.signature)
    .filter(p => !/^(&\s*)?('\w+\s+)?(mut\s+)?self$/.test(p))
    .map(p => {
      const colon = p.indexOf(':');
      return colon === -1 ? p : `${p.slice(0, colon).trim()} ${p.slice(colon + 1).trim()}`;
    })
    .map(escapeMember)
    .join(', ');
  const returns = method.returnType ? ` ${escapeMember(method.returnType)}` : '';

  return `${VISIBILITY_MARKERS[method.visibility]}${method.name}(${params})${returns}`;
}

function parameterList(signature: string): string[] {
  const fnIndex = signature.search(/\bfn\s/);
  const open = signature.indexOf('(', fnIndex === -1 ? 0 : fnIndex);
  if (open === -1) return [];

  let depth = 0;
  for (let i = open; i < signature.length; i++) {
    const ch = signature[i];
    if (ch === '(') depth++;
    else if (ch === ')') {
      depth--;
      if (depth === 0) return splitTopLevel(signature.slice(open + 1, i), ',');
    }
  }
  return [];
}

/**
 * Member text: paths shortened to their last segment, generics as `~T~`
 */
function escapeMember(text: string): string {
  return text
    .replace(/\b(?:\w+::)+/g, '')
    .replace(/[<>]/g, '~')
    .replace(/"/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

export function escapeLabel(text: string): string {
  return text
    .replace(/"/g, '#quot;')
    .replace(/:/g, '#58;')
    .replace(/\s+/g, ' ')
    .trim();
}
