/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

/**
 * Read a fixture file's contents
 */
export async function readFixture(...parts: string[]): Promise<string> {
  const fixturePath = getFixturePath(...parts);
  return fs.promises.readFile(fixturePath, 'utf-8');
}

export interface TempProjectResult {
  rootDir: string;
  cleanup: () => void;
  addFile: (relativePath: string, content: string) => string;
  getFilePath: (relativePath: string) => string;
}

/**
 * Create a temporary project directory with files
 */
export function createTempProject(files: Record<string, string> = {}): TempProjectResult {
  const rootDir = path.join(os.tmpdir(), `archscope-project-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(rootDir, { recursive: true });

  const addFile = (relativePath: string, content: string): string => {
    const filePath = path.join(rootDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    addFile(relativePath, content);
  }

  const cleanup = () => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  };

  const getFilePath = (relativePath: string): string => {
    return path.join(rootDir, relativePath);
  };

  return { rootDir, cleanup, addFile, getFilePath };
}

/**
 * Copy a fixture directory into a fresh temporary project
 */
export function copyFixtureProject(...parts: string[]): TempProjectResult {
  const project = createTempProject();
  fs.cpSync(getFixturePath(...parts), project.rootDir, { recursive: true });
  return project;
}

/**
 * Scenario A: `Factory::make` calls `Widget::new` across two modules
 */
export const WIDGET_CRATE: Record<string, string> = {
  'src/lib.rs': 'pub mod a;\npub mod b;\n',
  'src/a.rs': [
    'pub struct Widget {',
    '    pub id: u32,',
    '}',
    '',
    'impl Widget {',
    '    pub fn new() -> Self {',
    '        Widget { id: 0 }',
    '    }',
    '}',
    '',
  ].join('\n'),
  'src/b.rs': [
    'use crate::a::Widget;',
    '',
    'pub struct Factory;',
    '',
    'impl Factory {',
    '    pub fn make(&self) -> Widget {',
    '        Widget::new()',
    '    }',
    '}',
    '',
  ].join('\n'),
};

/**
 * Rust sources of the inventory fixture crate, root-relative
 */
export const INVENTORY_FILES = [
  'src/lib.rs',
  'src/model.rs',
  'src/service.rs',
  'src/store/memory.rs',
  'src/store/mod.rs',
];

/**
 * Read fixture crate sources as a (root-relative path -> source) map
 */
export function readFixtureCrate(name: string, files: string[]): Record<string, string> {
  const sources: Record<string, string> = {};
  for (const file of files) {
    sources[file] = fs.readFileSync(getFixturePath('rust', name, file), 'utf-8');
  }
  return sources;
}
