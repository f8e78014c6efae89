/**
 * Architecture extraction orchestration
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

import type {
  ArchitectureSnapshot,
  ImplBlock,
  SkippedFile,
  SourceUnit,
} from '../types/index.js';
import { DuplicateTypeError, ScanError } from '../errors.js';
import { createSnapshot } from '../snapshot/registry.js';
import { RustParser, type ParserOptions } from './parsers/index.js';
import { modulePathFor } from './module-path.js';
import { TypeResolver } from './type-resolver.js';

export interface ExtractorConfig {
  rootDirectory: string;
  include: string[];
  exclude: string[];
  concurrency?: number;
  parserOptions?: ParserOptions;
}

export interface ExtractionResult {
  snapshot: ArchitectureSnapshot;
  totalFiles: number;
  skipped: SkippedFile[];
  duplicates: DuplicateTypeError[];
  durationMs: number;
}

const DEFAULT_INCLUDE = ['**/*.rs'];
const DEFAULT_EXCLUDE = ['**/target/**', '**/.git/**', '**/node_modules/**'];

type FileOutcome =
  | { kind: 'unit'; unit: SourceUnit }
  | { kind: 'skipped'; skipped: SkippedFile };

export class Extractor {
  private config: Required<Omit<ExtractorConfig, 'parserOptions'>>;
  private parser: RustParser;

  constructor(config: ExtractorConfig) {
    this.config = {
      rootDirectory: config.rootDirectory,
      include: config.include.length > 0 ? config.include : DEFAULT_INCLUDE,
      exclude: config.exclude.length > 0 ? config.exclude : DEFAULT_EXCLUDE,
      concurrency: Math.max(1, config.concurrency ?? 8),
    };
    this.parser = new RustParser(config.parserOptions);
  }

  /**
   * Extract a single file. `filePath` is root-relative with `/` separators.
   */
  extract(filePath: string, text: string): SourceUnit {
    return this.parser.parseFile(filePath, text, modulePathFor(filePath));
  }

  async extractTree(directory?: string): Promise<ExtractionResult> {
    const startTime = Date.now();
    const rootDir = path.resolve(directory ?? this.config.rootDirectory);

    const files = (await fg(this.config.include, {
      cwd: rootDir,
      ignore: this.config.exclude,
      onlyFiles: true,
    })).sort();

    // Every file finishes before anything is merged
    const outcomes = await mapWithConcurrency(files, this.config.concurrency, relative =>
      this.extractFile(rootDir, relative)
    );

    const units: SourceUnit[] = [];
    const skipped: SkippedFile[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === 'unit') {
        units.push(outcome.unit);
      } else {
        skipped.push(outcome.skipped);
      }
    }

    const merged = createSnapshot(rootDir, units);
    const snapshot = resolveCallTargets(merged);

    return {
      snapshot,
      totalFiles: files.length,
      skipped,
      duplicates: snapshot.duplicates.map(d => new DuplicateTypeError(d)),
      durationMs: Date.now() - startTime,
    };
  }

  private async extractFile(rootDir: string, relative: string): Promise<FileOutcome> {
    const filePath = relative.split(path.sep).join('/');
    const content = await fs.promises.readFile(path.join(rootDir, relative), 'utf-8');

    if (this.parser.isFileTooLarge(content)) {
      return { kind: 'skipped', skipped: { filePath, reason: 'file exceeds parser.maxFileSize' } };
    }

    try {
      return { kind: 'unit', unit: this.extract(filePath, content) };
    } catch (error) {
      if (error instanceof ScanError) {
        return { kind: 'skipped', skipped: { filePath, reason: error.message } };
      }
      throw error;
    }
  }
}

/**
 * Fill every call site's target against the frozen registry. Returns a new
 * snapshot; the input is left untouched.
 */
export function resolveCallTargets(snapshot: ArchitectureSnapshot): ArchitectureSnapshot {
  const resolver = new TypeResolver(snapshot);
  const units = new Map<string, SourceUnit>();

  for (const [filePath, unit] of snapshot.units) {
    units.set(filePath, {
      ...unit,
      impls: unit.impls.map(impl => resolveImpl(resolver, unit, impl)),
    });
  }

  return { ...snapshot, units };
}

function resolveImpl(resolver: TypeResolver, unit: SourceUnit, impl: ImplBlock): ImplBlock {
  const selfType = resolver.resolveType(impl.target, unit);

  return {
    ...impl,
    methods: impl.methods.map(method => ({
      ...method,
      calls: method.calls.map(call => ({
        ...call,
        target: resolver.resolveCallee(call, unit, selfType),
      })),
    })),
  };
}

/**
 * Run `task` over `items` with at most `limit` in flight; results keep input order
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  task: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await task(item);
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

export { RustParser, LanguageParser, type ParserOptions } from './parsers/index.js';
export { TypeResolver, type ResolvedRef, type ResolverSource } from './type-resolver.js';
export { modulePathFor, crateRootOf, absoluteCandidates, joinPath, lastSegment } from './module-path.js';
