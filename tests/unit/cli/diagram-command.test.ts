import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import type { ViewOptions } from '../../../src/diagram/index.js';
import { render } from '../../../src/diagram/index.js';
import { buildGraph } from '../../../src/graph/index.js';
import { createTempProject, WIDGET_CRATE } from '../../helpers/fixtures.js';
import { snapshotFrom } from '../../helpers/snapshots.js';
import { captureOutput, type CapturedOutput } from '../../helpers/cli.js';

describe('CLI diagram and view commands', () => {
  let project: ReturnType<typeof createTempProject>;
  let output: CapturedOutput;

  beforeEach(() => {
    vi.resetModules();
    project = createTempProject(WIDGET_CRATE);
    output = captureOutput();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.doUnmock('../../../src/diagram/viewer.js');
    project.cleanup();
  });

  describe('diagram', () => {
    it('writes class markup for a directory', async () => {
      const { diagramCommand } = await import('../../../src/cli/commands/diagram.js');
      await diagramCommand.parseAsync([project.rootDir], { from: 'user' });

      const markupPath = path.join(project.rootDir, 'diagrams', `${path.basename(project.rootDir)}.mmd`);
      const snapshot = snapshotFrom(WIDGET_CRATE);
      expect(fs.readFileSync(markupPath, 'utf-8')).toBe(render(buildGraph(snapshot), 'class', { snapshot }));
      expect(output.log).toHaveBeenCalledWith(`Diagram written: ${markupPath}`);
      expect(output.log).toHaveBeenCalledWith('  Edges:       2');
    });

    it('writes the requested mode for a single file', async () => {
      vi.spyOn(process, 'cwd').mockReturnValue(project.rootDir);
      const { diagramCommand } = await import('../../../src/cli/commands/diagram.js');
      await diagramCommand.parseAsync([project.getFilePath('src/a.rs'), '--mode', 'state'], { from: 'user' });

      const markup = fs.readFileSync(path.join(project.rootDir, 'diagrams', 'a.mmd'), 'utf-8');
      expect(markup).toBe('stateDiagram-v2\n  state "Widget" as crate__a__Widget\n');
    });

    it('rejects unknown modes', async () => {
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const { diagramCommand } = await import('../../../src/cli/commands/diagram.js');

      await expect(diagramCommand.parseAsync([project.rootDir, '--mode', 'sequence'], { from: 'user' }))
        .rejects.toThrow('process.exit(1)');
    });

    it('exits with an error for a missing target', async () => {
      const { diagramCommand } = await import('../../../src/cli/commands/diagram.js');

      await expect(diagramCommand.parseAsync([project.getFilePath('nope.rs')], { from: 'user' }))
        .rejects.toThrow('process.exit(1)');
      expect(output.error.mock.calls[0]?.[0]).toBe('Error:');
    });
  });

  describe('view', () => {
    it('renders an existing markup file through the backend', async () => {
      const renderImage = vi.fn(async (_markupPath: string, _options: ViewOptions) => project.getFilePath('visuals/widget.svg'));
      vi.doMock('../../../src/diagram/viewer.js', async importOriginal => ({
        ...(await importOriginal<typeof import('../../../src/diagram/viewer.js')>()),
        renderImage,
      }));
      const markupPath = project.addFile('diagrams/widget.mmd', 'graph LR\n');
      const configPath = project.addFile('archscope.config.json', JSON.stringify({ render: { theme: 'dark', timeoutMs: 1000 } }));

      const { viewCommand } = await import('../../../src/cli/commands/diagram.js');
      await viewCommand.parseAsync([markupPath, '--format', 'pdf', '-c', configPath], { from: 'user' });

      expect(renderImage).toHaveBeenCalledWith(markupPath, {
        outDir: 'visuals',
        format: 'pdf',
        theme: 'dark',
        timeoutMs: 1000,
        command: 'mmdc',
        configFile: undefined,
        cssFile: undefined,
      });
      expect(output.log).toHaveBeenCalledWith(`Image written: ${project.getFilePath('visuals/widget.svg')}`);
    });

    it('exits with an error when the markup does not exist', async () => {
      const missing = project.getFilePath('diagrams/none.mmd');
      const { viewCommand } = await import('../../../src/cli/commands/diagram.js');

      await expect(viewCommand.parseAsync([missing], { from: 'user' })).rejects.toThrow('process.exit(1)');
      expect(output.error).toHaveBeenCalledWith(
        'Error:',
        `Diagram not found: ${missing}. Run \`archscope diagram\` first.`
      );
    });
  });
});
