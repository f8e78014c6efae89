/**
 * Abstract base class for source parsers
 */

import type { SourceUnit } from '../../types/index.js';

export interface ParserOptions {
  maxFileSize?: number;
}

export abstract class LanguageParser {
  protected options: Required<ParserOptions>;

  constructor(options: ParserOptions = {}) {
    this.options = {
      maxFileSize: options.maxFileSize ?? 1024 * 1024, // 1MB
    };
  }

  /**
   * File extensions this parser handles (lowercase, without dot)
   */
  abstract get extensions(): string[];

  /**
   * Extract the architecture of one source file.
   * Throws ScanError when the file's delimiters do not balance.
   */
  abstract parseFile(filePath: string, content: string, modulePath?: string): SourceUnit;

  canParse(filePath: string): boolean {
    const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
    return this.extensions.includes(ext);
  }

  /**
   * Check if content exceeds max file size (0 = unlimited)
   */
  isFileTooLarge(content: string): boolean {
    const limit = this.options.maxFileSize;
    return limit > 0 && Buffer.byteLength(content, 'utf8') > limit;
  }

  protected emptyUnit(filePath: string, modulePath: string): SourceUnit {
    return { filePath, modulePath, types: [], impls: [], imports: [] };
  }
}
