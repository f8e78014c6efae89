/**
 * Diagram commands that read a stored snapshot: connections, state_diagram,
 * class_diagram, and the view_* pairs that also render an image
 */

import { Command, Option } from 'commander';
import path from 'node:path';

import type { DiagramMode } from '../../types/index.js';
import type { ImageFormat, RenderTheme } from '../../config/index.js';
import { readSnapshot } from '../../snapshot/index.js';
import { fail, parseDepth, resolveConfig, writeDiagram, writeImage } from '../shared.js';

interface SnapshotDiagramOptions {
  snapshot?: string;
  outDir?: string;
  focus?: string;
  depth: number;
  config?: string;
  format?: ImageFormat;
  theme?: RenderTheme;
}

interface SnapshotDiagramDefinition {
  name: string;
  description: string;
  mode: DiagramMode;
  /** Render the markup to an image after writing it */
  view: boolean;
  /** Base name of the written .mmd file */
  output: string;
}

function snapshotDiagramCommand(definition: SnapshotDiagramDefinition): Command {
  const command = new Command(definition.name)
    .description(definition.description)
    .option('--snapshot <dir>', 'Snapshot directory written by `archscope architecture`')
    .option('--out-dir <dir>', 'Directory for the .mmd file')
    .option('--focus <type>', 'Only show types near this one')
    .option('--depth <n>', 'Edges to follow from the focus type', parseDepth, 1)
    .option('-c, --config <path>', 'Path to config file');

  if (definition.view) {
    command
      .addOption(new Option('--format <format>', 'Image format').choices(['svg', 'png', 'pdf']))
      .addOption(new Option('--theme <theme>', 'Mermaid theme').choices(['default', 'neutral', 'dark', 'forest']));
  }

  return command.action(async (options: SnapshotDiagramOptions) => {
    try {
      const config = await resolveConfig(process.cwd(), options.config);
      const snapshot = await readSnapshot(options.snapshot ?? config.output.snapshotDir);

      const markupPath = await writeDiagram({
        snapshot,
        mode: definition.mode,
        name: definition.output,
        outDir: path.resolve(options.outDir ?? config.output.diagramDir),
        config,
        focus: options.focus,
        depth: options.depth,
      });

      if (definition.view) {
        await writeImage(markupPath, config, { format: options.format, theme: options.theme });
      }
    } catch (error) {
      fail(error);
    }
  });
}

export const connectionsCommand = snapshotDiagramCommand({
  name: 'connections',
  description: 'Abbreviated diagram: one arrow per pair of related types',
  mode: 'connections',
  view: false,
  output: 'connections',
});

export const stateDiagramCommand = snapshotDiagramCommand({
  name: 'state_diagram',
  description: 'State diagram of the calls that construct or transform other types',
  mode: 'state',
  view: false,
  output: 'state_diagram',
});

export const classDiagramCommand = snapshotDiagramCommand({
  name: 'class_diagram',
  description: 'Class diagram with members, containment, trait impls and calls',
  mode: 'class',
  view: false,
  output: 'class_diagram',
});

export const viewClassDiagramCommand = snapshotDiagramCommand({
  name: 'view_class_diagram',
  description: 'Generate the class diagram and render it to an image',
  mode: 'class',
  view: true,
  output: 'class_diagram',
});

export const viewConnectionsCommand = snapshotDiagramCommand({
  name: 'view_connections',
  description: 'Generate the connections diagram and render it to an image',
  mode: 'connections',
  view: true,
  output: 'connections',
});
