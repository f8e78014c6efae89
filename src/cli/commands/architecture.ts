/**
 * architecture command - Extract a snapshot of a Rust source tree
 */

import { Command } from 'commander';
import path from 'node:path';
import { Extractor } from '../../extractor/index.js';
import { writeSnapshot } from '../../snapshot/index.js';
import { fail, reportProblems, resolveConfig } from '../shared.js';

interface ArchitectureOptions {
  output?: string;
  config?: string;
  include?: string[];
  exclude?: string[];
  verbose: boolean;
}

export const architectureCommand = new Command('architecture')
  .description('Extract types, impls and imports into a snapshot directory')
  .argument('[dir]', 'Directory to process', '.')
  .option('-o, --output <path>', 'Snapshot output directory')
  .option('-c, --config <path>', 'Path to config file')
  .option('--include <patterns...>', 'Glob patterns to include')
  .option('--exclude <patterns...>', 'Glob patterns to exclude')
  .option('--verbose', 'List every skipped file', false)
  .action(async (dir: string, options: ArchitectureOptions) => {
    const rootDirectory = path.resolve(dir);

    console.log(`Extracting architecture from ${rootDirectory}...\n`);

    try {
      const config = await resolveConfig(rootDirectory, options.config);
      const outputDir = path.resolve(rootDirectory, options.output ?? config.output.snapshotDir);

      const extractor = new Extractor({
        rootDirectory,
        include: options.include ?? config.include,
        exclude: options.exclude ?? config.exclude,
        concurrency: config.extraction.concurrency,
        parserOptions: { maxFileSize: config.parser.maxFileSize },
      });

      const result = await extractor.extractTree();
      await writeSnapshot(result.snapshot, outputDir);

      const typeCount = Array.from(result.snapshot.units.values())
        .reduce((n, unit) => n + unit.types.length, 0);

      console.log('Extraction complete!\n');
      console.log(`  Total files:   ${result.totalFiles}`);
      console.log(`  Extracted:     ${result.snapshot.units.size}`);
      console.log(`  Skipped:       ${result.skipped.length}`);
      console.log(`  Types:         ${typeCount}`);
      console.log(`  Duplicates:    ${result.duplicates.length}`);
      console.log(`  Duration:      ${result.durationMs}ms`);
      console.log(`  Snapshot:      ${outputDir}\n`);

      reportProblems(result, options.verbose);
    } catch (error) {
      fail(error);
    }
  });
