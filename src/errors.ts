/**
 * Error types raised by extraction, storage, diffing and rendering
 */

import type { DuplicateType } from './types/index.js';

export class ArchscopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Unbalanced or unterminated delimiters in one source file
 */
export class ScanError extends ArchscopeError {
  constructor(
    readonly filePath: string,
    readonly line: number,
    detail: string
  ) {
    super(`${filePath}:${line}: ${detail}`);
  }
}

export class DuplicateTypeError extends ArchscopeError {
  readonly qualifiedName: string;
  readonly locations: DuplicateType['locations'];

  constructor(duplicate: DuplicateType) {
    const where = duplicate.locations.map(l => `${l.filePath}:${l.line}`).join(', ');
    super(`Type ${duplicate.qualifiedName} is defined more than once (${where})`);
    this.qualifiedName = duplicate.qualifiedName;
    this.locations = duplicate.locations;
  }
}

export class GraphError extends ArchscopeError {
  constructor(readonly duplicates: string[]) {
    super(`Cannot build relationship graph: duplicate type names ${duplicates.join(', ')}`);
  }
}

export class SnapshotFormatError extends ArchscopeError {
  constructor(
    readonly artifactPath: string,
    detail: string
  ) {
    super(`Invalid snapshot artifact ${artifactPath}: ${detail}`);
  }
}

export class DiffIncompatibleError extends ArchscopeError {
  constructor(
    readonly directory: string,
    readonly reason: Error
  ) {
    super(`Cannot diff snapshot ${directory}: ${reason.message}`);
  }
}

export class RenderMarkupError extends ArchscopeError {}

export class RenderBackendError extends ArchscopeError {
  constructor(
    message: string,
    readonly stderr: string = ''
  ) {
    super(stderr ? `${message}: ${stderr.trim()}` : message);
  }
}
