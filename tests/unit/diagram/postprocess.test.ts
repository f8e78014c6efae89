import { describe, it, expect } from 'vitest';
import {
  cleanMermaid,
  formatMermaid,
  mergeMermaid,
  sanitizeFileName,
  splitMermaid,
} from '../../../src/diagram/index.js';
import { RenderMarkupError } from '../../../src/errors.js';

function lines(...rows: string[]): string {
  return rows.join('\n') + '\n';
}

const SERVICES = lines(
  'flowchart LR',
  'classDef hot fill:#f96',
  'classDef cold fill:#9cf',
  'classDef idle fill:#eee',
  'subgraph Core [Core services]',
  '  A[Api] --> B[(Db)]',
  '  subgraph Inner',
  '    C',
  '  end',
  'end',
  'subgraph Edge',
  '  D:::cold --> E',
  'end',
  'A --> D',
  'class A,D hot',
);

describe('formatMermaid', () => {
  it('indents statements under the header', () => {
    expect(formatMermaid('graph TD\nA-->B\n   C --> D\n')).toBe(lines(
      'graph TD',
      '    A-->B',
      '    C --> D',
    ));
  });

  it('indents nested subgraphs and moves style statements to the end', () => {
    const input = lines(
      'flowchart TB',
      'classDef hot fill:#f96',
      'A-->B',
      '  subgraph One',
      'direction LR',
      'C:::hot --> D',
      '',
      'subgraph Two',
      'E',
      'end',
      'end',
      'class A,B hot',
      'classDef hot fill:#f96',
    );

    expect(formatMermaid(input)).toBe(lines(
      'flowchart TB',
      '    A-->B',
      '    subgraph One',
      '        direction LR',
      '        C:::hot --> D',
      '        subgraph Two',
      '            E',
      '        end',
      '    end',
      '',
      '    classDef hot fill:#f96',
      '    class A,B hot',
    ));
  });

  it('leaves an already formatted diagram unchanged', () => {
    const formatted = formatMermaid(SERVICES);
    expect(formatMermaid(formatted)).toBe(formatted);
  });

  it('indents brace blocks of class diagrams in place', () => {
    expect(formatMermaid('classDiagram\nclass A {\n+int x\n}\nclass B\nA <|-- B\n')).toBe(lines(
      'classDiagram',
      '    class A {',
      '        +int x',
      '    }',
      '    class B',
      '    A <|-- B',
    ));
  });
});

describe('cleanMermaid', () => {
  it('drops init blocks, commented-out edges and unused classDefs', () => {
    const input = lines(
      '%%{init: {',
      '  "theme": "dark"',
      '}}%%',
      'flowchart TB',
      '    A[Start&nbsp;here] --> B:::warm',
      '    %% A --> C',
      '    %% keep this note',
      'classDef warm fill:#fc9',
      'classDef cold fill:#9cf',
      'classDef spare fill:#ccc',
      'class C cold',
    );

    expect(cleanMermaid(input)).toBe(lines(
      'flowchart TB',
      '    A[Start here] --> B:::warm',
      '    %% keep this note',
      '',
      'classDef cold fill:#9cf',
      'classDef warm fill:#fc9',
      'class C cold',
    ));
  });

  it('keeps class declarations of class diagrams', () => {
    expect(cleanMermaid('classDiagram\nclass Animal\nclass Dog Pet\n')).toBe('classDiagram\nclass Animal\nclass Dog Pet\n');
  });
});

describe('splitMermaid', () => {
  it('writes one flowchart per top-level subgraph with the classes it uses', () => {
    const parts = splitMermaid(SERVICES);

    expect(parts.map(p => p.name)).toEqual(['Core', 'Edge']);
    expect(parts[0]?.markup).toBe(lines(
      'flowchart TB',
      '    subgraph Core [Core services]',
      '        A[Api] --> B[(Db)]',
      '        subgraph Inner',
      '            C',
      '        end',
      '    end',
      '',
      '    classDef hot fill:#f96',
      '    class A hot',
    ));
    expect(parts[1]?.markup).toBe(lines(
      'flowchart TB',
      '    subgraph Edge',
      '        D:::cold --> E',
      '    end',
      '',
      '    classDef cold fill:#9cf',
      '    classDef hot fill:#f96',
      '    class D hot',
    ));
  });

  it('numbers repeated subgraph names and skips empty ones', () => {
    const parts = splitMermaid('flowchart TB\nsubgraph S\nA\nend\nsubgraph Empty\nend\nsubgraph S\nB\nend\n');
    expect(parts.map(p => p.name)).toEqual(['S', 'S_2']);
  });

  it('rejects a subgraph without end', () => {
    expect(() => splitMermaid('flowchart TB\nsubgraph Open\nA\n')).toThrow(RenderMarkupError);
    expect(() => splitMermaid('flowchart TB\nsubgraph Open\nA\n')).toThrow('Subgraph Open on line 2 is never closed');
  });
});

describe('mergeMermaid', () => {
  it('joins split parts under one header', () => {
    const parts = splitMermaid(SERVICES).map(p => p.markup);

    expect(mergeMermaid(parts)).toBe(lines(
      'flowchart LR',
      '    subgraph Core [Core services]',
      '        A[Api] --> B[(Db)]',
      '        subgraph Inner',
      '            C',
      '        end',
      '    end',
      '    subgraph Edge',
      '        D:::cold --> E',
      '    end',
      '',
      '    classDef cold fill:#9cf',
      '    classDef hot fill:#f96',
      '    class A hot',
      '    class D hot',
    ));
  });

  it('keeps the last definition of a class', () => {
    const merged = mergeMermaid(['flowchart TB\nA\nclassDef x fill:#000\n', 'graph LR\nB\nclassDef x fill:#fff\n']);
    expect(merged).toBe(lines('flowchart LR', '    A', '    B', '', '    classDef x fill:#fff'));
  });
});

describe('sanitizeFileName', () => {
  it('replaces characters outside letters, digits, dashes and underscores', () => {
    expect(sanitizeFileName('Core services/v2')).toBe('Core_services_v2');
  });
});
