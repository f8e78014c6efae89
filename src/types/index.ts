export * from './architecture.js';
export * from './graph.js';
export * from './diff.js';
