import { describe, it, expect } from 'vitest';
import { abbreviate } from '../../../src/graph/index.js';
import type { RelationshipGraph } from '../../../src/types/index.js';

const GRAPH: RelationshipGraph = {
  nodes: ['crate::Engine', 'crate::Idle', 'crate::Wheel'],
  edges: [
    { source: 'crate::Engine', target: 'crate::Wheel', kind: 'contains', label: 'wheels', cardinality: 'many' },
    { source: 'crate::Engine', target: 'crate::Wheel', kind: 'calls', label: 'spin' },
    { source: 'crate::Engine', target: 'crate::Wheel', kind: 'calls', label: 'stop' },
    { source: 'crate::Wheel', target: 'crate::Engine', kind: 'calls', label: 'notify' },
  ],
  skipped: { unresolvedCalls: 3, duplicates: [] },
};

describe('abbreviate', () => {
  it('collapses parallel edges into one per direction', () => {
    const view = abbreviate(GRAPH);

    expect(view.edges).toEqual([
      { source: 'crate::Engine', target: 'crate::Wheel', kind: 'contains', label: '' },
      { source: 'crate::Wheel', target: 'crate::Engine', kind: 'calls', label: '' },
    ]);
  });

  it('drops nodes without edges', () => {
    expect(abbreviate(GRAPH).nodes).toEqual(['crate::Engine', 'crate::Wheel']);
  });

  it('keeps the skipped counts', () => {
    expect(abbreviate(GRAPH).skipped).toEqual({ unresolvedCalls: 3, duplicates: [] });
  });

  it('is idempotent', () => {
    const once = abbreviate(GRAPH);
    expect(abbreviate(once)).toEqual(once);
  });

  it('prefers implements over every other kind', () => {
    const view = abbreviate({
      nodes: ['crate::Dot', 'crate::Shape'],
      edges: [
        { source: 'crate::Dot', target: 'crate::Shape', kind: 'calls', label: 'area' },
        { source: 'crate::Dot', target: 'crate::Shape', kind: 'implements', label: '' },
      ],
      skipped: { unresolvedCalls: 0, duplicates: [] },
    });

    expect(view.edges).toEqual([
      { source: 'crate::Dot', target: 'crate::Shape', kind: 'implements', label: '' },
    ]);
  });
});
