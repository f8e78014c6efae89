/**
 * archscope - architecture snapshots for Rust crates
 *
 * Extracts types, impl blocks, imports and call sites from Rust sources,
 * stores them as diffable YAML snapshots, compares snapshots and renders
 * type relationship graphs as Mermaid diagrams.
 */

// Types
export * from './types/index.js';

// Errors
export {
  ArchscopeError,
  ScanError,
  DuplicateTypeError,
  GraphError,
  SnapshotFormatError,
  DiffIncompatibleError,
  RenderMarkupError,
  RenderBackendError,
} from './errors.js';

// Extraction
export {
  Extractor,
  resolveCallTargets,
  mapWithConcurrency,
  RustParser,
  LanguageParser,
  TypeResolver,
  modulePathFor,
  type ExtractorConfig,
  type ExtractionResult,
  type ParserOptions,
  type ResolvedRef,
} from './extractor/index.js';

// Snapshots
export {
  createSnapshot,
  canonicalize,
  snapshotsEqual,
  writeSnapshot,
  readSnapshot,
} from './snapshot/index.js';

// Diff
export { diff, diffDirectories, formatDiff, formatSkipped, type DiffOptions } from './diff/index.js';

// Graph
export {
  buildGraph,
  abbreviate,
  filterGraph,
  type BuildGraphOptions,
  type FilterOptions,
} from './graph/index.js';

// Diagrams
export {
  render,
  renderTraitDiagram,
  renderImage,
  sanitizeId,
  formatMermaid,
  cleanMermaid,
  splitMermaid,
  mergeMermaid,
  type RenderOptions,
  type TraitDiagramOptions,
  type MermaidPart,
  type ViewOptions,
  type CommandRunner,
} from './diagram/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
