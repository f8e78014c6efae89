/**
 * Graph module exports
 */

export {
  buildGraph,
  compareEdges,
  kindPrecedence,
  isConstructorName,
  type BuildGraphOptions,
} from './builder.js';
export { abbreviate } from './abbreviate.js';
export { filterGraph, findNode, type FilterOptions } from './filter.js';
