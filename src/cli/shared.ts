/**
 * Helpers shared by CLI commands
 */

import fs from 'node:fs';
import path from 'node:path';
import { InvalidArgumentError } from 'commander';

import type { ArchitectureSnapshot, DiagramMode } from '../types/index.js';
import type { ExtractionResult } from '../extractor/index.js';
import { loadConfig, loadConfigOrDefault, type Config } from '../config/index.js';
import { buildGraph, filterGraph } from '../graph/index.js';
import { render, renderImage } from '../diagram/index.js';

export async function resolveConfig(startDir: string, configPath?: string): Promise<Config> {
  return configPath ? loadConfig(configPath) : loadConfigOrDefault(startDir);
}

/**
 * Print an error the way every command reports failure, then exit 1
 */
export function fail(error: unknown): void {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}

/**
 * Summarize skipped files and duplicate names; never drops them silently
 */
export function reportProblems(result: ExtractionResult, verbose: boolean): void {
  for (const duplicate of result.duplicates) {
    console.warn(`Warning: ${duplicate.message}`);
  }

  if (result.skipped.length === 0) return;

  if (verbose) {
    console.warn('Skipped files:');
    for (const skipped of result.skipped) {
      console.warn(`  ${skipped.filePath}: ${skipped.reason}`);
    }
  } else {
    console.warn(`Warning: ${result.skipped.length} file(s) skipped; rerun with --verbose for details`);
  }
}

export interface DiagramOutput {
  snapshot: ArchitectureSnapshot;
  mode: DiagramMode;
  name: string;
  outDir: string;
  config: Config;
  focus?: string;
  depth?: number;
}

/**
 * Build the graph, render markup and write `<outDir>/<name>.mmd`
 */
export async function writeDiagram(output: DiagramOutput): Promise<string> {
  const built = buildGraph(output.snapshot, { allowDuplicates: output.config.graph.allowDuplicates });
  const graph = output.focus
    ? filterGraph(built, { focus: output.focus, depth: output.depth })
    : built;

  if (graph.skipped.duplicates.length > 0) {
    console.warn(`Warning: duplicate types left out of the diagram: ${graph.skipped.duplicates.join(', ')}`);
  }

  const markup = render(graph, output.mode, { snapshot: output.snapshot });
  const outDir = path.resolve(output.outDir);
  await fs.promises.mkdir(outDir, { recursive: true });

  const markupPath = path.join(outDir, `${output.name}.mmd`);
  await fs.promises.writeFile(markupPath, markup, 'utf-8');

  console.log(`Diagram written: ${markupPath}`);
  console.log(`  Types:       ${graph.nodes.length}`);
  console.log(`  Edges:       ${graph.edges.length}`);
  console.log(`  Unresolved:  ${graph.skipped.unresolvedCalls} call(s)`);

  return markupPath;
}

export interface ImageOptions {
  format?: Config['render']['format'];
  theme?: Config['render']['theme'];
  outDir?: string;
}

export async function writeImage(markupPath: string, config: Config, options: ImageOptions = {}): Promise<string> {
  const imagePath = await renderImage(markupPath, {
    outDir: options.outDir ?? config.output.imageDir,
    format: options.format ?? config.render.format,
    theme: options.theme ?? config.render.theme,
    timeoutMs: config.render.timeoutMs,
    command: config.render.command,
    configFile: config.render.configFile,
    cssFile: config.render.cssFile,
  });
  console.log(`Image written: ${imagePath}`);
  return imagePath;
}

export function parseDepth(value: string): number {
  const depth = Number.parseInt(value, 10);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidArgumentError('Depth must be a non-negative integer.');
  }
  return depth;
}
