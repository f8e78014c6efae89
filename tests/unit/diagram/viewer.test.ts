import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { renderImage, withTheme, type CommandRunner } from '../../../src/diagram/index.js';
import { RenderBackendError } from '../../../src/errors.js';
import { createTempProject } from '../../helpers/fixtures.js';

describe('withTheme', () => {
  it('prepends an init directive', () => {
    expect(withTheme('graph LR\n', 'dark')).toBe('%%{init: {"theme": "dark"}}%%\ngraph LR\n');
  });

  it('leaves markup with its own directive alone', () => {
    const markup = '%%{init: {"theme": "forest"}}%%\ngraph LR\n';
    expect(withTheme(markup, 'dark')).toBe(markup);
  });
});

describe('renderImage', () => {
  let workspace: ReturnType<typeof createTempProject>;
  let markupPath: string;

  beforeEach(() => {
    workspace = createTempProject({ 'diagrams/class_diagram.mmd': 'classDiagram\n' });
    markupPath = workspace.getFilePath('diagrams/class_diagram.mmd');
  });

  afterEach(() => {
    workspace.cleanup();
  });

  it('runs the backend on a themed copy of the markup', async () => {
    let input = '';
    let inputPath = '';
    const runner = vi.fn<CommandRunner>(async (_command, args) => {
      inputPath = args[1] ?? '';
      input = fs.readFileSync(inputPath, 'utf-8');
      return { stdout: '', stderr: '' };
    });

    const outDir = workspace.getFilePath('visuals');
    const output = await renderImage(markupPath, { outDir, format: 'png', theme: 'neutral', runner, timeoutMs: 500 });

    expect(output).toBe(path.join(outDir, 'class_diagram.png'));
    expect(runner).toHaveBeenCalledWith('mmdc', ['-i', inputPath, '-o', output], { timeoutMs: 500 });
    expect(input).toBe('%%{init: {"theme": "neutral"}}%%\nclassDiagram\n');
    expect(fs.existsSync(path.dirname(inputPath))).toBe(false);
    expect(fs.existsSync(outDir)).toBe(true);
  });

  it('passes config and stylesheet files through', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ stdout: '', stderr: '' }));
    await renderImage(markupPath, {
      outDir: workspace.getFilePath('visuals'),
      command: 'render-tool',
      configFile: 'mermaid.json',
      cssFile: 'style.css',
      runner,
    });

    const [command, args] = runner.mock.calls[0] ?? [];
    expect(command).toBe('render-tool');
    expect(args?.slice(4)).toEqual(['-c', 'mermaid.json', '-C', 'style.css']);
  });

  it('wraps backend failures and removes the temporary copy', async () => {
    let inputPath = '';
    const runner: CommandRunner = async (_command, args) => {
      inputPath = args[1] ?? '';
      throw Object.assign(new Error('exit 1'), { stderr: 'Parse error on line 1\n' });
    };

    await expect(renderImage(markupPath, { outDir: workspace.getFilePath('visuals'), runner }))
      .rejects.toThrow('mmdc failed: Parse error on line 1');
    expect(fs.existsSync(path.dirname(inputPath))).toBe(false);
  });

  it('explains a missing backend', async () => {
    const runner: CommandRunner = async () => {
      throw Object.assign(new Error('spawn mmdc ENOENT'), { code: 'ENOENT' });
    };

    await expect(renderImage(markupPath, { outDir: workspace.getFilePath('visuals'), runner }))
      .rejects.toThrow('mmdc not found; install @mermaid-js/mermaid-cli or set render.command');
  });

  it('reports timeouts', async () => {
    const runner: CommandRunner = async () => {
      throw Object.assign(new Error('killed'), { killed: true, stderr: '' });
    };

    await expect(renderImage(markupPath, { outDir: workspace.getFilePath('visuals'), runner, timeoutMs: 5 }))
      .rejects.toThrow('mmdc timed out after 5ms');
  });

  it('keeps errors the runner already classified', async () => {
    const runner: CommandRunner = async () => {
      throw new RenderBackendError('custom failure');
    };

    await expect(renderImage(markupPath, { outDir: workspace.getFilePath('visuals'), runner }))
      .rejects.toThrow(new RenderBackendError('custom failure'));
  });

  it('fails when the markup file is missing', async () => {
    const runner = vi.fn<CommandRunner>();
    await expect(renderImage(workspace.getFilePath('missing.mmd'), { outDir: workspace.rootDir, runner }))
      .rejects.toThrow();
    expect(runner).not.toHaveBeenCalled();
  });
});
