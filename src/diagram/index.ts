/**
 * Diagram module exports
 */

export { render, sanitizeId, DIAGRAM_MODES, type RenderOptions } from './mermaid.js';
export { renderTraitDiagram, type TraitDiagramOptions } from './traits.js';
export {
  formatMermaid,
  cleanMermaid,
  splitMermaid,
  mergeMermaid,
  sanitizeFileName,
  type MermaidPart,
} from './postprocess.js';
export {
  renderImage,
  runCommand,
  withTheme,
  type CommandRunner,
  type CommandResult,
  type ViewOptions,
} from './viewer.js';
