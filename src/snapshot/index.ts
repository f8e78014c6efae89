/**
 * Snapshot module exports
 */

export { createSnapshot, compareStrings } from './registry.js';
export { canonicalize, canonicalizeUnit, snapshotsEqual } from './canonical.js';
export {
  writeSnapshot,
  readSnapshot,
  serializeUnit,
  parseArtifact,
  artifactPathFor,
  artifactSchema,
  manifestSchema,
  ARTIFACT_EXTENSION,
  MANIFEST_FILE,
  type SnapshotArtifact,
  type SnapshotManifest,
} from './store.js';
