import { describe, it, expect } from 'vitest';
import {
  configSchema,
  outputConfigSchema,
  parserConfigSchema,
  extractionConfigSchema,
  renderConfigSchema,
} from '../../../src/config/schema.js';

describe('Config Schema', () => {
  describe('configSchema', () => {
    it('should apply default values for empty object', () => {
      const result = configSchema.parse({});

      expect(result.include).toEqual(['**/*.rs']);
      expect(result.exclude).toContain('**/target/**');
      expect(result.output.snapshotDir).toBe('architecture');
      expect(result.graph.allowDuplicates).toBe(false);
    });

    it('should validate include patterns', () => {
      const valid = configSchema.safeParse({ include: ['src/**/*.rs', 'benches/**/*.rs'] });
      expect(valid.success).toBe(true);
      expect(valid.data?.include).toEqual(['src/**/*.rs', 'benches/**/*.rs']);

      const invalid = configSchema.safeParse({ include: 'src/**/*.rs' });
      expect(invalid.success).toBe(false);
    });

    it('should validate exclude patterns', () => {
      const valid = configSchema.safeParse({ exclude: ['**/examples/**'] });
      expect(valid.success).toBe(true);
      expect(valid.data?.exclude).toEqual(['**/examples/**']);
    });

    it('should merge partial nested sections with their defaults', () => {
      const result = configSchema.parse({ output: { imageDir: 'docs/img' }, render: { theme: 'neutral' } });

      expect(result.output).toEqual({ snapshotDir: 'architecture', diagramDir: 'diagrams', imageDir: 'docs/img' });
      expect(result.render.theme).toBe('neutral');
      expect(result.render.format).toBe('svg');
    });
  });

  describe('outputConfigSchema', () => {
    it('should reject non-string directories', () => {
      expect(outputConfigSchema.safeParse({ snapshotDir: 42 }).success).toBe(false);
    });
  });

  describe('parserConfigSchema', () => {
    it('should accept zero as unlimited', () => {
      expect(parserConfigSchema.parse({ maxFileSize: 0 }).maxFileSize).toBe(0);
    });

    it('should reject negative and fractional sizes', () => {
      expect(parserConfigSchema.safeParse({ maxFileSize: -1 }).success).toBe(false);
      expect(parserConfigSchema.safeParse({ maxFileSize: 1.5 }).success).toBe(false);
    });
  });

  describe('extractionConfigSchema', () => {
    it('should bound concurrency', () => {
      expect(extractionConfigSchema.safeParse({ concurrency: 1 }).success).toBe(true);
      expect(extractionConfigSchema.safeParse({ concurrency: 64 }).success).toBe(true);
      expect(extractionConfigSchema.safeParse({ concurrency: 0 }).success).toBe(false);
      expect(extractionConfigSchema.safeParse({ concurrency: 65 }).success).toBe(false);
    });
  });

  describe('renderConfigSchema', () => {
    it('should accept the supported formats and themes', () => {
      for (const format of ['svg', 'png', 'pdf']) {
        expect(renderConfigSchema.safeParse({ format }).success).toBe(true);
      }
      for (const theme of ['default', 'neutral', 'dark', 'forest']) {
        expect(renderConfigSchema.safeParse({ theme }).success).toBe(true);
      }
    });

    it('should reject unknown formats and themes', () => {
      expect(renderConfigSchema.safeParse({ format: 'gif' }).success).toBe(false);
      expect(renderConfigSchema.safeParse({ theme: 'solarized' }).success).toBe(false);
    });

    it('should keep optional backend files', () => {
      const result = renderConfigSchema.parse({ configFile: 'mermaid.json', cssFile: 'diagram.css' });
      expect(result.configFile).toBe('mermaid.json');
      expect(result.cssFile).toBe('diagram.css');
    });
  });
});
