/**
 * Text-level tools for Mermaid files: formatting, cleanup, and splitting a
 * flowchart by subgraph or merging several flowcharts back into one
 */

import { RenderMarkupError } from '../errors.js';
import { compareStrings } from '../snapshot/registry.js';

export interface MermaidPart {
  /** Subgraph id, unique within one split */
  name: string;
  markup: string;
}

interface ClassAssignment {
  elements: string[];
  className: string;
}

const INDENT = '    ';
const HEADER = /^(graph|flowchart|classDiagram|stateDiagram(-v2)?|sequenceDiagram|erDiagram|gantt|pie)\b/;
const FLOWCHART = /^(graph|flowchart)\b/;
const BLOCK_OPENER = /^(subgraph|loop|alt|opt|par|critical|break|rect|box)\b/;
const SUBGRAPH = /^subgraph\b/;
const STYLE_STATEMENT = /^(classDef|class|style|linkStyle)\s/;
const CLASS_DEF = /^classDef\s+([\w-]+)\s+(.+?);?$/;
const CLASS_STATEMENT = /^class\s+([\w-]+(?:\s*,\s*[\w-]+)*)\s+([\w-]+);?$/;
const INLINE_CLASS = /([A-Za-z_][\w-]*):::([\w-]+)/g;
const STYLE_RANK = ['classDef', 'class', 'style', 'linkStyle'];

/**
 * Reindent a diagram four spaces per block level. In flowcharts, style
 * statements (`classDef`, `class`, `style`, `linkStyle`) move to the end,
 * deduplicated and sorted. Blank lines are dropped.
 */
export function formatMermaid(input: string): string {
  const body: string[] = [];
  const styles = new Set<string>();
  let headerSeen = false;
  let flowchart = false;
  let open = 0;

  for (const raw of input.split('\n')) {
    const line = raw.trim();
    if (line.length === 0) continue;

    if (!headerSeen && HEADER.test(line)) {
      headerSeen = true;
      flowchart = FLOWCHART.test(line);
      body.push(line);
      continue;
    }
    if (flowchart && STYLE_STATEMENT.test(line)) {
      styles.add(line);
      continue;
    }

    const comment = line.startsWith('%%');
    if (!comment && (line === 'end' || line === '}')) open = Math.max(0, open - 1);
    body.push(INDENT.repeat((headerSeen ? 1 : 0) + open) + line);
    if (!comment && (BLOCK_OPENER.test(line) || line.endsWith('{'))) open++;
  }

  const sortedStyles = Array.from(styles).sort((a, b) =>
    styleRank(a) - styleRank(b) || compareStrings(a, b)
  );
  const lines = sortedStyles.length > 0
    ? [...body, '', ...sortedStyles.map(s => INDENT + s)]
    : body;
  return lines.join('\n') + '\n';
}

/**
 * Drop `%%{init}%%` blocks, commented-out edges and class statements, and
 * classDefs nothing uses; gather the remaining definitions and class
 * statements at the end, sorted. `&nbsp;` becomes a plain space.
 */
export function cleanMermaid(input: string): string {
  const lines: string[] = [];
  const definitions = new Map<string, string>();
  const statements = new Set<string>();
  const used = new Set<string>();
  let flowchart = false;
  let inInit = false;

  for (const raw of input.split('\n')) {
    const line = raw.trim();
    if (inInit) {
      if (line.includes('}%%')) inInit = false;
      continue;
    }
    if (line.startsWith('%%{')) {
      inInit = !line.includes('}%%');
      continue;
    }
    if (line.length === 0) continue;
    if (line.startsWith('%%') && (line.includes('-->') || line.includes('class'))) continue;

    if (lines.length === 0 && HEADER.test(line)) flowchart = FLOWCHART.test(line);

    const definition = parseClassDef(line);
    if (definition) {
      definitions.set(definition[0], definition[1]);
      continue;
    }
    const assignment = flowchart ? parseClassStatement(line) : null;
    if (assignment) {
      statements.add(formatAssignment(assignment));
      used.add(assignment.className);
      continue;
    }

    for (const match of line.matchAll(INLINE_CLASS)) used.add(match[2]);
    lines.push(raw.replace(/&nbsp;/g, ' ').trimEnd());
  }

  const tail = [
    ...Array.from(definitions)
      .filter(([name]) => used.has(name))
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([name, properties]) => `classDef ${name} ${properties}`),
    ...Array.from(statements).sort(compareStrings),
  ];

  return (tail.length > 0 ? [...lines, '', ...tail] : lines).join('\n') + '\n';
}

/**
 * One flowchart per top-level subgraph. Each part keeps the classDefs its
 * nodes use and the class statements naming its nodes.
 */
export function splitMermaid(input: string): MermaidPart[] {
  const lines = input.split('\n');
  const definitions = new Map<string, string>();
  const assignments: ClassAssignment[] = [];

  for (const raw of lines) {
    const line = raw.trim();
    const definition = parseClassDef(line);
    if (definition) definitions.set(definition[0], definition[1]);
    const assignment = parseClassStatement(line);
    if (assignment) assignments.push(assignment);
  }

  const parts: MermaidPart[] = [];
  const taken = new Map<string, number>();

  for (let i = 0; i < lines.length; i++) {
    const first = (lines[i] ?? '').trim();
    if (!SUBGRAPH.test(first)) continue;

    const end = closingEnd(lines, i);
    const block = lines.slice(i, end + 1).map(l => l.replace(/&nbsp;/g, ' '));
    i = end;
    if (block.slice(1, -1).every(l => l.trim().length === 0)) continue;

    const nodes = nodeIds(block);
    const used = new Set<string>();
    for (const line of block) {
      for (const match of line.matchAll(INLINE_CLASS)) {
        if (nodes.has(match[1])) used.add(match[2]);
      }
    }

    const statements: string[] = [];
    for (const assignment of assignments) {
      const elements = assignment.elements.filter(e => nodes.has(e));
      if (elements.length === 0) continue;
      statements.push(formatAssignment({ elements, className: assignment.className }));
      used.add(assignment.className);
    }

    const classDefs = Array.from(definitions)
      .filter(([name]) => used.has(name))
      .map(([name, properties]) => `classDef ${name} ${properties}`);

    const base = subgraphName(first);
    const seen = (taken.get(base) ?? 0) + 1;
    taken.set(base, seen);

    parts.push({
      name: seen === 1 ? base : `${base}_${seen}`,
      markup: formatMermaid(['flowchart TB', ...block, ...classDefs, ...statements].join('\n')),
    });
  }

  return parts;
}

/**
 * Concatenate flowcharts under one `flowchart LR` header. Class definitions
 * are merged by name, the last one winning; class statements are deduplicated.
 */
export function mergeMermaid(inputs: string[]): string {
  const body: string[] = [];
  const definitions = new Map<string, string>();
  const statements = new Set<string>();

  for (const input of inputs) {
    for (const raw of input.split('\n')) {
      const line = raw.trim();
      if (line.length === 0 || FLOWCHART.test(line)) continue;

      const definition = parseClassDef(line);
      if (definition) {
        definitions.set(definition[0], definition[1]);
        continue;
      }
      const assignment = parseClassStatement(line);
      if (assignment) {
        statements.add(formatAssignment(assignment));
        continue;
      }
      body.push(line);
    }
  }

  const classDefs = Array.from(definitions, ([name, properties]) => `classDef ${name} ${properties}`);
  return formatMermaid(['flowchart LR', ...body, ...classDefs, ...statements].join('\n'));
}

/**
 * File name for a part: anything but letters, digits, `-` and `_` becomes `_`
 */
export function sanitizeFileName(name: string): string {
  return name.replace(/[^A-Za-z0-9_-]/g, '_');
}

function styleRank(line: string): number {
  return STYLE_RANK.indexOf(line.slice(0, line.search(/\s/)));
}

function parseClassDef(line: string): [string, string] | null {
  const match = CLASS_DEF.exec(line);
  return match ? [match[1], match[2]] : null;
}

function parseClassStatement(line: string): ClassAssignment | null {
  const match = CLASS_STATEMENT.exec(line);
  if (!match) return null;
  return { elements: match[1].split(',').map(e => e.trim()), className: match[2] };
}

function formatAssignment(assignment: ClassAssignment): string {
  return `class ${assignment.elements.join(',')} ${assignment.className}`;
}

function subgraphName(line: string): string {
  const match = /^subgraph\s+(?:"([^"]+)"|([^\s[]+))/.exec(line);
  return match?.[1] ?? match?.[2] ?? 'unnamed';
}

function closingEnd(lines: string[], start: number): number {
  let depth = 0;
  for (let j = start; j < lines.length; j++) {
    const line = (lines[j] ?? '').trim();
    if (SUBGRAPH.test(line)) depth++;
    else if (line === 'end') depth--;
    if (depth === 0) return j;
  }
  throw new RenderMarkupError(
    `Subgraph ${subgraphName((lines[start] ?? '').trim())} on line ${start + 1} is never closed`
  );
}

/**
 * Node ids mentioned in a block: subgraph ids plus every identifier left
 * once labels, quoted text and inline classes are removed
 */
function nodeIds(block: string[]): Set<string> {
  const ids = new Set<string>();

  for (const raw of block) {
    const line = raw.trim();
    if (SUBGRAPH.test(line)) {
      ids.add(subgraphName(line));
      continue;
    }
    if (line === 'end' || line.startsWith('%%') || STYLE_STATEMENT.test(line) || line.startsWith('direction ')) {
      continue;
    }

    const stripped = line
      .replace(/"[^"]*"/g, '')
      .replace(/\[[^\]]*\]|\([^)]*\)|\{[^}]*\}|\|[^|]*\|/g, '')
      .replace(/:::[\w-]+/g, '');
    for (const match of stripped.matchAll(/[A-Za-z_]\w*/g)) ids.add(match[0]);
  }

  return ids;
}
