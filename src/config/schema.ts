/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const parserConfigSchema = z.object({
  maxFileSize: z.number().int().min(0).default(1024 * 1024), // 1MB default, 0 = unlimited
});

export const extractionConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(8),
});

export const outputConfigSchema = z.object({
  snapshotDir: z.string().default('architecture'),
  diagramDir: z.string().default('diagrams'),
  imageDir: z.string().default('visuals'),
});

export const graphConfigSchema = z.object({
  allowDuplicates: z.boolean().default(false),
});

export const renderConfigSchema = z.object({
  command: z.string().default('mmdc'),
  format: z.enum(['svg', 'png', 'pdf']).default('svg'),
  theme: z.enum(['default', 'neutral', 'dark', 'forest']).default('default'),
  timeoutMs: z.number().int().min(1).default(60_000),
  configFile: z.string().optional(),
  cssFile: z.string().optional(),
});

export const configSchema = z.object({
  include: z.array(z.string()).default(['**/*.rs']),
  exclude: z.array(z.string()).default([
    '**/target/**',
    '**/.git/**',
    '**/node_modules/**',
  ]),
  output: outputConfigSchema.default({}),
  parser: parserConfigSchema.default({}),
  extraction: extractionConfigSchema.default({}),
  graph: graphConfigSchema.default({}),
  render: renderConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ParserConfig = z.infer<typeof parserConfigSchema>;
export type ExtractionConfig = z.infer<typeof extractionConfigSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;
export type GraphConfig = z.infer<typeof graphConfigSchema>;
export type RenderConfig = z.infer<typeof renderConfigSchema>;
export type ImageFormat = RenderConfig['format'];
export type RenderTheme = RenderConfig['theme'];
