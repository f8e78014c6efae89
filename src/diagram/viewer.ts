/**
 * Image rendering through the external mermaid-cli (`mmdc`) binary
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import type { ImageFormat, RenderTheme } from '../config/index.js';
import { RenderBackendError } from '../errors.js';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<CommandResult>;

export interface ViewOptions {
  outDir: string;
  format?: ImageFormat;
  theme?: RenderTheme;
  timeoutMs?: number;
  command?: string;
  configFile?: string;
  cssFile?: string;
  runner?: CommandRunner;
}

/**
 * Default runner; failures keep the child's stderr
 */
export const runCommand: CommandRunner = async (command, args, { timeoutMs }) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: timeoutMs,
      encoding: 'utf-8',
      maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (error) {
    throw toBackendError(command, timeoutMs, error);
  }
};

function toBackendError(command: string, timeoutMs: number, error: unknown): RenderBackendError {
  if (!(error instanceof Error)) {
    return new RenderBackendError(`${command} failed: ${String(error)}`);
  }

  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  if ('code' in error && error.code === 'ENOENT') {
    return new RenderBackendError(`${command} not found; install @mermaid-js/mermaid-cli or set render.command`);
  }
  if ('killed' in error && error.killed === true) {
    return new RenderBackendError(`${command} timed out after ${timeoutMs}ms`, stderr);
  }
  return new RenderBackendError(`${command} failed`, stderr);
}

/**
 * Prefix markup with a Mermaid init directive selecting the theme, unless
 * the markup carries its own directive
 */
export function withTheme(markup: string, theme: RenderTheme): string {
  if (markup.trimStart().startsWith('%%{init')) return markup;
  return `%%{init: {"theme": "${theme}"}}%%\n${markup}`;
}

/**
 * Render a `.mmd` file to `<outDir>/<name>.<format>`. Returns the image path.
 */
export async function renderImage(markupPath: string, options: ViewOptions): Promise<string> {
  const format = options.format ?? 'svg';
  const timeoutMs = options.timeoutMs ?? 60_000;
  const command = options.command ?? 'mmdc';
  const runner = options.runner ?? runCommand;

  const markup = await fs.promises.readFile(markupPath, 'utf-8');
  const outDir = path.resolve(options.outDir);
  const outputPath = path.join(outDir, `${path.basename(markupPath, '.mmd')}.${format}`);
  await fs.promises.mkdir(outDir, { recursive: true });

  const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'archscope-'));
  const inputPath = path.join(tempDir, 'diagram.mmd');

  try {
    await fs.promises.writeFile(inputPath, withTheme(markup, options.theme ?? 'default'), 'utf-8');

    const args = ['-i', inputPath, '-o', outputPath];
    if (options.configFile) args.push('-c', options.configFile);
    if (options.cssFile) args.push('-C', options.cssFile);

    try {
      await runner(command, args, { timeoutMs });
    } catch (error) {
      throw error instanceof RenderBackendError ? error : toBackendError(command, timeoutMs, error);
    }
  } finally {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  }

  return outputPath;
}
