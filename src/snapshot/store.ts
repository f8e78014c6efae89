/**
 * Snapshot store - one YAML document per source file
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import { parse, stringify } from 'yaml';
import { z } from 'zod';

import type { ArchitectureSnapshot, Location, SourceUnit } from '../types/index.js';
import { SnapshotFormatError } from '../errors.js';
import { canonicalizeUnit } from './canonical.js';
import { compareStrings, createSnapshot } from './registry.js';

export const ARTIFACT_EXTENSION = '.yaml';

/** Lists the artifacts of the last write; nothing else in the directory is touched */
export const MANIFEST_FILE = '.archscope-manifest.json';

const visibilitySchema = z.enum(['public', 'crate', 'restricted', 'private']);
const linesSchema = z.tuple([z.number().int().min(1), z.number().int().min(1)]);

const callSchema = z.object({
  callee: z.string(),
  method: z.string(),
  target: z.string().nullable(),
  line: z.number().int().min(1),
});

const methodSchema = z.object({
  name: z.string(),
  visibility: visibilitySchema,
  signature: z.string(),
  returns: z.string().nullable(),
  lines: linesSchema,
  calls: z.array(callSchema).default([]),
});

const typeSchema = z.object({
  name: z.string(),
  qualified: z.string(),
  kind: z.enum(['struct', 'enum', 'trait']),
  visibility: visibilitySchema,
  lines: linesSchema,
  fields: z.array(z.object({ name: z.string(), type: z.string() })).default([]),
});

const implSchema = z.object({
  target: z.string(),
  trait: z.string().nullable(),
  lines: linesSchema,
  methods: z.array(methodSchema).default([]),
});

export const artifactSchema = z.object({
  file: z.string().min(1),
  module: z.string().min(1),
  imports: z.array(z.object({ path: z.string(), alias: z.string().nullable() })).default([]),
  types: z.array(typeSchema).default([]),
  impls: z.array(implSchema).default([]),
});

export type SnapshotArtifact = z.infer<typeof artifactSchema>;

export const manifestSchema = z.object({
  artifacts: z.array(z.string().min(1)),
});

export type SnapshotManifest = z.infer<typeof manifestSchema>;

/**
 * Path of the artifact describing `filePath`, relative to the output directory
 */
export function artifactPathFor(filePath: string): string {
  return `${filePath}${ARTIFACT_EXTENSION}`;
}

export function toArtifact(unit: SourceUnit): SnapshotArtifact {
  const canonical = canonicalizeUnit(unit);

  return {
    file: canonical.filePath,
    module: canonical.modulePath,
    imports: canonical.imports,
    types: canonical.types.map(type => ({
      name: type.name,
      qualified: type.qualifiedName,
      kind: type.kind,
      visibility: type.visibility,
      lines: linesOf(type.location),
      fields: type.fields,
    })),
    impls: canonical.impls.map(impl => ({
      target: impl.target,
      trait: impl.trait,
      lines: linesOf(impl.location),
      methods: impl.methods.map(method => ({
        name: method.name,
        visibility: method.visibility,
        signature: method.signature,
        returns: method.returnType,
        lines: linesOf(method.location),
        calls: method.calls,
      })),
    })),
  };
}

function linesOf(location: Location): [number, number] {
  return [location.startLine, location.endLine];
}

export function fromArtifact(artifact: SnapshotArtifact): SourceUnit {
  const filePath = artifact.file;
  const at = (lines: [number, number]): Location => ({ filePath, startLine: lines[0], endLine: lines[1] });

  return {
    filePath,
    modulePath: artifact.module,
    imports: artifact.imports,
    types: artifact.types.map(type => ({
      name: type.name,
      qualifiedName: type.qualified,
      kind: type.kind,
      visibility: type.visibility,
      fields: type.fields,
      location: at(type.lines),
    })),
    impls: artifact.impls.map(impl => ({
      target: impl.target,
      trait: impl.trait,
      location: at(impl.lines),
      methods: impl.methods.map(method => ({
        name: method.name,
        signature: method.signature,
        returnType: method.returns,
        visibility: method.visibility,
        calls: method.calls,
        location: at(method.lines),
      })),
    })),
  };
}

export function serializeUnit(unit: SourceUnit): string {
  return stringify(toArtifact(unit), { lineWidth: 0 });
}

/**
 * Write every unit of the snapshot under `outputDir`. Artifacts listed in the
 * manifest of an earlier write are removed first; other files are left alone.
 * Returns the written paths, sorted.
 */
export async function writeSnapshot(
  snapshot: ArchitectureSnapshot,
  outputDir: string
): Promise<string[]> {
  const absoluteDir = path.resolve(outputDir);
  await fs.promises.mkdir(absoluteDir, { recursive: true });

  const previous = await readManifest(absoluteDir);
  for (const artifact of previous?.artifacts ?? []) {
    const stale = resolveArtifact(absoluteDir, artifact);
    if (stale) await fs.promises.rm(stale, { force: true });
  }

  const units = Array.from(snapshot.units.values())
    .sort((a, b) => compareStrings(a.filePath, b.filePath));
  const written: string[] = [];

  for (const unit of units) {
    const target = path.join(absoluteDir, artifactPathFor(unit.filePath));
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, serializeUnit(unit), 'utf-8');
    written.push(target);
  }

  const manifest: SnapshotManifest = {
    artifacts: units.map(unit => artifactPathFor(unit.filePath)),
  };
  await fs.promises.writeFile(
    path.join(absoluteDir, MANIFEST_FILE),
    JSON.stringify(manifest, null, 2) + '\n',
    'utf-8'
  );

  return written;
}

/**
 * Load a snapshot directory. With a manifest only the listed artifacts are
 * read; without one every `.yaml` file under the directory is.
 */
export async function readSnapshot(outputDir: string): Promise<ArchitectureSnapshot> {
  const absoluteDir = path.resolve(outputDir);

  let isDirectory = false;
  try {
    isDirectory = (await fs.promises.stat(absoluteDir)).isDirectory();
  } catch (error) {
    throw new SnapshotFormatError(absoluteDir, error instanceof Error ? error.message : String(error));
  }
  if (!isDirectory) {
    throw new SnapshotFormatError(absoluteDir, 'not a directory');
  }

  const manifest = await readManifest(absoluteDir);
  const files = manifest
    ? [...manifest.artifacts].sort(compareStrings)
    : (await fg(`**/*${ARTIFACT_EXTENSION}`, {
      cwd: absoluteDir,
      onlyFiles: true,
      dot: true,
    })).sort(compareStrings);

  const units: SourceUnit[] = [];
  for (const relative of files) {
    const artifactPath = resolveArtifact(absoluteDir, relative);
    if (!artifactPath) {
      throw new SnapshotFormatError(path.join(absoluteDir, MANIFEST_FILE), `invalid artifact path ${relative}`);
    }

    let content: string;
    try {
      content = await fs.promises.readFile(artifactPath, 'utf-8');
    } catch (error) {
      throw new SnapshotFormatError(artifactPath, error instanceof Error ? error.message : String(error));
    }
    units.push(parseArtifact(artifactPath, content));
  }

  const seen = new Set<string>();
  for (const unit of units) {
    if (seen.has(unit.filePath)) {
      throw new SnapshotFormatError(absoluteDir, `source file ${unit.filePath} is described twice`);
    }
    seen.add(unit.filePath);
  }

  return createSnapshot(absoluteDir, units);
}

async function readManifest(absoluteDir: string): Promise<SnapshotManifest | null> {
  const manifestPath = path.join(absoluteDir, MANIFEST_FILE);
  if (!fs.existsSync(manifestPath)) return null;

  let document: unknown;
  try {
    document = JSON.parse(await fs.promises.readFile(manifestPath, 'utf-8'));
  } catch (error) {
    throw new SnapshotFormatError(manifestPath, error instanceof Error ? error.message : String(error));
  }

  const result = manifestSchema.safeParse(document);
  if (!result.success) {
    const errors = result.error.errors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`).join('; ');
    throw new SnapshotFormatError(manifestPath, errors);
  }
  return result.data;
}

/**
 * Absolute path of a manifest entry, or null when it is not a `.yaml` file
 * inside the directory
 */
function resolveArtifact(absoluteDir: string, relative: string): string | null {
  if (!relative.endsWith(ARTIFACT_EXTENSION)) return null;
  const resolved = path.resolve(absoluteDir, relative);
  const inside = path.relative(absoluteDir, resolved);
  if (inside.length === 0 || inside.startsWith('..') || path.isAbsolute(inside)) return null;
  return resolved;
}

export function parseArtifact(artifactPath: string, content: string): SourceUnit {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new SnapshotFormatError(artifactPath, error instanceof Error ? error.message : String(error));
  }

  const result = artifactSchema.safeParse(document);
  if (!result.success) {
    const errors = result.error.errors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`).join('; ');
    throw new SnapshotFormatError(artifactPath, errors);
  }

  return fromArtifact(result.data);
}
