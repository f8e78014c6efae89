#!/usr/bin/env node

/**
 * archscope CLI
 */

import { Command } from 'commander';
import { architectureCommand } from './commands/architecture.js';
import { diffCommand } from './commands/diff.js';
import { diagramCommand, viewCommand } from './commands/diagram.js';
import {
  connectionsCommand,
  stateDiagramCommand,
  classDiagramCommand,
  viewClassDiagramCommand,
  viewConnectionsCommand,
} from './commands/snapshot-diagrams.js';
import { generateMermaidCommand, generateLightMermaidCommand } from './commands/trait-diagrams.js';
import {
  lintMermaidCommand,
  cleanMermaidCommand,
  splitMermaidCommand,
  mergeMermaidsCommand,
} from './commands/mermaid-tools.js';

const program = new Command();

program
  .name('archscope')
  .description('archscope - architecture snapshots, diffs and Mermaid diagrams for Rust crates')
  .version('0.1.0');

// Register commands
program.addCommand(architectureCommand);
program.addCommand(diffCommand);
program.addCommand(diagramCommand);
program.addCommand(viewCommand);
program.addCommand(connectionsCommand);
program.addCommand(stateDiagramCommand);
program.addCommand(classDiagramCommand);
program.addCommand(viewClassDiagramCommand);
program.addCommand(viewConnectionsCommand);
program.addCommand(generateMermaidCommand);
program.addCommand(generateLightMermaidCommand);
program.addCommand(lintMermaidCommand);
program.addCommand(cleanMermaidCommand);
program.addCommand(splitMermaidCommand);
program.addCommand(mergeMermaidsCommand);

await program.parseAsync(process.argv);
