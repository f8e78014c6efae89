/**
 * diagram and view commands - Markup from a source file or directory, and
 * images from markup
 */

import { Command, Option } from 'commander';
import fs from 'node:fs';
import path from 'node:path';

import type { ArchitectureSnapshot, DiagramMode } from '../../types/index.js';
import type { ImageFormat, RenderTheme } from '../../config/index.js';
import { Extractor, resolveCallTargets } from '../../extractor/index.js';
import { createSnapshot } from '../../snapshot/index.js';
import { DIAGRAM_MODES } from '../../diagram/index.js';
import { fail, reportProblems, resolveConfig, writeDiagram, writeImage } from '../shared.js';

const IMAGE_FORMATS: ImageFormat[] = ['svg', 'png', 'pdf'];
const THEMES: RenderTheme[] = ['default', 'neutral', 'dark', 'forest'];

interface DiagramCommandOptions {
  mode: DiagramMode;
  format?: ImageFormat;
  config?: string;
  verbose: boolean;
}

interface ViewCommandOptions {
  format?: ImageFormat;
  theme?: RenderTheme;
  config?: string;
}

export const diagramCommand = new Command('diagram')
  .description('Create a Mermaid diagram of the type relationships in a Rust file or directory')
  .argument('<target>', 'A .rs file or a directory of Rust sources')
  .addOption(new Option('--mode <mode>', 'Diagram kind').choices(DIAGRAM_MODES).default('class'))
  .addOption(new Option('--format <format>', 'Also render an image').choices(IMAGE_FORMATS))
  .option('-c, --config <path>', 'Path to config file')
  .option('--verbose', 'List every skipped file', false)
  .action(async (target: string, options: DiagramCommandOptions) => {
    try {
      const targetPath = path.resolve(target);
      const stat = await fs.promises.stat(targetPath);
      const baseDir = stat.isDirectory() ? targetPath : process.cwd();
      const config = await resolveConfig(baseDir, options.config);

      const extractor = new Extractor({
        rootDirectory: baseDir,
        include: config.include,
        exclude: config.exclude,
        concurrency: config.extraction.concurrency,
        parserOptions: { maxFileSize: config.parser.maxFileSize },
      });

      let snapshot: ArchitectureSnapshot;
      if (stat.isDirectory()) {
        const result = await extractor.extractTree();
        reportProblems(result, options.verbose);
        snapshot = result.snapshot;
      } else {
        const relative = path.relative(baseDir, targetPath).split(path.sep).join('/');
        const unit = extractor.extract(relative, await fs.promises.readFile(targetPath, 'utf-8'));
        snapshot = resolveCallTargets(createSnapshot(baseDir, [unit]));
      }

      const markupPath = await writeDiagram({
        snapshot,
        mode: options.mode,
        name: path.basename(targetPath, '.rs'),
        outDir: path.resolve(baseDir, config.output.diagramDir),
        config,
      });

      if (options.format) {
        await writeImage(markupPath, config, {
          format: options.format,
          outDir: path.resolve(baseDir, config.output.imageDir),
        });
      }
    } catch (error) {
      fail(error);
    }
  });

export const viewCommand = new Command('view')
  .description('Render diagrams/<target>.mmd to an image')
  .argument('<target>', 'Diagram name, source file or .mmd path')
  .addOption(new Option('--format <format>', 'Image format').choices(IMAGE_FORMATS))
  .addOption(new Option('--theme <theme>', 'Mermaid theme').choices(THEMES))
  .option('-c, --config <path>', 'Path to config file')
  .action(async (target: string, options: ViewCommandOptions) => {
    try {
      const config = await resolveConfig(process.cwd(), options.config);
      const markupPath = target.endsWith('.mmd')
        ? path.resolve(target)
        : path.resolve(config.output.diagramDir, `${path.basename(target, '.rs')}.mmd`);

      if (!fs.existsSync(markupPath)) {
        throw new Error(`Diagram not found: ${markupPath}. Run \`archscope diagram\` first.`);
      }

      await writeImage(markupPath, config, { format: options.format, theme: options.theme });
    } catch (error) {
      fail(error);
    }
  });
