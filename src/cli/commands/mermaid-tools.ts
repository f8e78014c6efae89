/**
 * Mermaid file tools: lint_mermaid, clean_mermaid, split_mermaid and
 * merge_mermaids
 */

import { Command } from 'commander';
import fg from 'fast-glob';
import fs from 'node:fs';
import path from 'node:path';

import {
  cleanMermaid,
  formatMermaid,
  mergeMermaid,
  sanitizeFileName,
  splitMermaid,
} from '../../diagram/index.js';
import { fail } from '../shared.js';

interface LintCommandOptions {
  inPlace: boolean;
}

/**
 * `diagrams/deps.mmd` + `_clean` -> `diagrams/deps_clean.mmd`
 */
function withSuffix(file: string, suffix: string): string {
  const extension = path.extname(file);
  return path.join(path.dirname(file), `${path.basename(file, extension)}${suffix}${extension}`);
}

export const lintMermaidCommand = new Command('lint_mermaid')
  .description('Reindent a Mermaid file and gather its style statements at the end')
  .argument('<file>', 'Mermaid file')
  .option('-i, --in-place', 'Overwrite the input instead of writing <name>_formatted', false)
  .action(async (file: string, options: LintCommandOptions) => {
    try {
      const inputPath = path.resolve(file);
      const formatted = formatMermaid(await fs.promises.readFile(inputPath, 'utf-8'));
      const outputPath = options.inPlace ? inputPath : withSuffix(inputPath, '_formatted');
      await fs.promises.writeFile(outputPath, formatted, 'utf-8');

      console.log(options.inPlace ? `File formatted in place: ${outputPath}` : `Formatted file written: ${outputPath}`);
    } catch (error) {
      fail(error);
    }
  });

export const cleanMermaidCommand = new Command('clean_mermaid')
  .description('Drop init blocks and unused classDefs; writes <name>_clean')
  .argument('<file>', 'Mermaid file')
  .action(async (file: string) => {
    try {
      const inputPath = path.resolve(file);
      const cleaned = cleanMermaid(await fs.promises.readFile(inputPath, 'utf-8'));
      const outputPath = withSuffix(inputPath, '_clean');
      await fs.promises.writeFile(outputPath, cleaned, 'utf-8');

      console.log(`Cleaned file written: ${outputPath}`);
    } catch (error) {
      fail(error);
    }
  });

export const splitMermaidCommand = new Command('split_mermaid')
  .description('Write each top-level subgraph to its own file in a directory named after the input')
  .argument('<file>', 'Mermaid flowchart')
  .action(async (file: string) => {
    try {
      const inputPath = path.resolve(file);
      const parts = splitMermaid(await fs.promises.readFile(inputPath, 'utf-8'));
      if (parts.length === 0) {
        throw new Error(`No subgraphs found in ${inputPath}`);
      }

      const extension = path.extname(inputPath);
      const outDir = path.join(path.dirname(inputPath), path.basename(inputPath, extension));
      await fs.promises.mkdir(outDir, { recursive: true });
      for (const part of parts) {
        await fs.promises.writeFile(path.join(outDir, `${sanitizeFileName(part.name)}${extension}`), part.markup, 'utf-8');
      }

      console.log(`Split into ${parts.length} file(s): ${outDir}`);
    } catch (error) {
      fail(error);
    }
  });

export const mergeMermaidsCommand = new Command('merge_mermaids')
  .description('Merge every .mmd and .mermaid file in a directory into <dir>.mmd beside it')
  .argument('<dir>', 'Directory of Mermaid flowcharts')
  .action(async (dir: string) => {
    try {
      const inputDir = path.resolve(dir);
      const files = (await fg('*.{mmd,mermaid}', { cwd: inputDir, onlyFiles: true })).sort();
      if (files.length === 0) {
        throw new Error(`No Mermaid files found in ${inputDir}`);
      }

      const inputs = await Promise.all(files.map(f => fs.promises.readFile(path.join(inputDir, f), 'utf-8')));
      const outputPath = path.join(path.dirname(inputDir), `${path.basename(inputDir)}.mmd`);
      await fs.promises.writeFile(outputPath, mergeMermaid(inputs), 'utf-8');

      console.log(`Merged ${files.length} file(s) into ${outputPath}`);
    } catch (error) {
      fail(error);
    }
  });
