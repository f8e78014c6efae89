/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { configSchema, type Config } from './schema.js';

const CONFIG_NAMES = ['archscope.config.json', '.archscoperc.json'];

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  return parseConfig(rawConfig);
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (true) {
    for (const configName of CONFIG_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    // Check package.json for an archscope key
    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const section = await readPackageSection(packagePath);
      if (section !== undefined) {
        return parseConfig(section);
      }
    }

    if (currentDir === root) break;
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

function parseConfig(rawConfig: unknown): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

async function readPackageSection(packagePath: string): Promise<unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // A broken package.json is not ours to report
    return undefined;
  }

  if (typeof parsed === 'object' && parsed !== null && 'archscope' in parsed) {
    return parsed.archscope;
  }
  return undefined;
}

export { configSchema, type Config } from './schema.js';
