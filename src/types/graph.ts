/**
 * Relationship graph types
 */

export type EdgeKind = 'calls' | 'implements' | 'contains' | 'state-transition';
export type Cardinality = 'one' | 'many';

export interface GraphEdge {
  source: string;
  target: string;
  kind: EdgeKind;
  label: string;
  cardinality?: Cardinality;
}

export interface GraphSkipped {
  unresolvedCalls: number;
  duplicates: string[];
}

export interface RelationshipGraph {
  nodes: string[];
  edges: GraphEdge[];
  skipped: GraphSkipped;
}

export type DiagramMode = 'class' | 'state' | 'connections' | 'entity';
