/**
 * Structural view of tree-sitter syntax nodes and delimiter balancing
 */

import { ScanError } from '../../errors.js';

export interface TreeSitterNode {
  type: string;
  text: string;
  startIndex: number;
  endIndex: number;
  startPosition: { row: number; column: number };
  endPosition: { row: number; column: number };
  children: TreeSitterNode[];
  namedChildren: TreeSitterNode[];
  parent: TreeSitterNode | null;
  childForFieldName(name: string): TreeSitterNode | null;
}

const CLOSERS: Record<string, string> = { '}': '{', ')': '(', ']': '[' };
const OPENERS = new Set(Object.values(CLOSERS));

/**
 * Match every delimiter token of the tree in document order.
 *
 * Tokens inserted by error recovery have zero width and are ignored, so an
 * unterminated block surfaces as an unclosed opener.
 */
export function checkDelimiters(root: TreeSitterNode, filePath: string): void {
  const open: TreeSitterNode[] = [];
  const pending: TreeSitterNode[] = [root];

  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) break;

    const children = node.children;
    if (children.length > 0) {
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) pending.push(child);
      }
      continue;
    }

    if (node.startIndex === node.endIndex) continue;

    if (OPENERS.has(node.type)) {
      open.push(node);
      continue;
    }

    const expected = CLOSERS[node.type];
    if (expected === undefined) continue;

    const top = open.pop();
    if (!top) {
      throw new ScanError(filePath, node.startPosition.row + 1, `unexpected '${node.type}'`);
    }
    if (top.type !== expected) {
      throw new ScanError(
        filePath,
        node.startPosition.row + 1,
        `'${node.type}' does not close '${top.type}' opened on line ${top.startPosition.row + 1}`
      );
    }
  }

  const unclosed = open.pop();
  if (unclosed) {
    throw new ScanError(filePath, unclosed.startPosition.row + 1, `unclosed '${unclosed.type}'`);
  }
}
