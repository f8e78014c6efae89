/**
 * Config module exports
 */

export {
  configSchema,
  parserConfigSchema,
  extractionConfigSchema,
  outputConfigSchema,
  graphConfigSchema,
  renderConfigSchema,
  type Config,
  type ParserConfig,
  type ExtractionConfig,
  type OutputConfig,
  type GraphConfig,
  type RenderConfig,
  type ImageFormat,
  type RenderTheme,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
} from './loader.js';
