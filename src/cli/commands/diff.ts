/**
 * diff command - Compare two stored snapshots
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { diffDirectories, formatDiff } from '../../diff/index.js';
import { DuplicateTypeError } from '../../errors.js';
import type { DuplicateType } from '../../types/index.js';
import { fail } from '../shared.js';

interface DiffCommandOptions {
  methods: boolean;
  json: boolean;
  output?: string;
}

export const diffCommand = new Command('diff')
  .description('Compare two snapshot directories and report structural changes')
  .argument('<dir1>', 'Snapshot before the change')
  .argument('<dir2>', 'Snapshot after the change')
  .option('--methods', 'Report each method as its own entry', false)
  .option('--json', 'Output as JSON', false)
  .option('-o, --output <file>', 'Write the report to a file')
  .action(async (dir1: string, dir2: string, options: DiffCommandOptions) => {
    try {
      const result = await diffDirectories(dir1, dir2, {
        granularity: options.methods ? 'method' : 'type',
      });

      warnSkipped(dir1, result.skipped.before);
      warnSkipped(dir2, result.skipped.after);

      const report = options.json ? JSON.stringify(result, null, 2) : formatDiff(result);

      if (options.output) {
        const outputPath = path.resolve(options.output);
        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        await fs.promises.writeFile(outputPath, report + '\n', 'utf-8');
        console.log(`Diff written: ${outputPath}`);
      } else {
        console.log(report);
      }
    } catch (error) {
      fail(error);
    }
  });

function warnSkipped(directory: string, duplicates: DuplicateType[]): void {
  for (const duplicate of duplicates) {
    const { message } = new DuplicateTypeError(duplicate);
    console.warn(`Warning: ${directory}: ${message}; left out of the diff`);
  }
}
