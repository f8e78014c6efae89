/**
 * Diff module exports
 */

export { diff, diffDirectories, type DiffOptions } from './engine.js';
export { collectEntities, methodKey, type EntityIndex } from './entities.js';
export { formatDiff, formatSkipped } from './format.js';
