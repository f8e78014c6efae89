/**
 * Parser exports
 */

export { LanguageParser, type ParserOptions } from './base.js';
export { RustParser } from './rust.js';
export { checkDelimiters, type TreeSitterNode } from './syntax-node.js';
