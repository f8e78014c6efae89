/**
 * generate_mermaid and generate_light_mermaid - Trait reference diagrams
 * from a stored snapshot
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';

import { readSnapshot } from '../../snapshot/index.js';
import { renderTraitDiagram } from '../../diagram/index.js';
import { fail, resolveConfig } from '../shared.js';

interface TraitDiagramCommandOptions {
  snapshot?: string;
  outDir?: string;
  config?: string;
}

function traitDiagramCommand(name: string, light: boolean, output: string): Command {
  return new Command(name)
    .description(light
      ? 'Trait diagram without method signatures'
      : 'Trait diagram with method signatures and the traits they reference')
    .option('--snapshot <dir>', 'Snapshot directory written by `archscope architecture`')
    .option('--out-dir <dir>', 'Directory for the .mmd file')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: TraitDiagramCommandOptions) => {
      try {
        const config = await resolveConfig(process.cwd(), options.config);
        const snapshot = await readSnapshot(options.snapshot ?? config.output.snapshotDir);
        const markup = renderTraitDiagram(snapshot, { light });

        const outDir = path.resolve(options.outDir ?? config.output.diagramDir);
        await fs.promises.mkdir(outDir, { recursive: true });
        const markupPath = path.join(outDir, `${output}.mmd`);
        await fs.promises.writeFile(markupPath, markup, 'utf-8');

        console.log(`Diagram written: ${markupPath}`);
      } catch (error) {
        fail(error);
      }
    });
}

export const generateMermaidCommand = traitDiagramCommand('generate_mermaid', false, 'traits');
export const generateLightMermaidCommand = traitDiagramCommand('generate_light_mermaid', true, 'traits_light');
