import { describe, it, expect } from 'vitest';
import {
  modulePathFor,
  joinPath,
  parentModule,
  lastSegment,
  absoluteCandidates,
  crateRootOf,
} from '../../../src/extractor/module-path.js';

describe('modulePathFor', () => {
  it('maps the library root to crate', () => {
    expect(modulePathFor('src/lib.rs')).toBe('crate');
    expect(modulePathFor('lib.rs')).toBe('crate');
  });

  it('gives each binary root its own prefix', () => {
    expect(modulePathFor('src/main.rs')).toBe('main');
    expect(modulePathFor('src/bin/tool.rs')).toBe('bin::tool');
    expect(modulePathFor('src/bin/tool/main.rs')).toBe('bin::tool');
    expect(modulePathFor('src/bin/tool/args.rs')).toBe('bin::tool::args');
    expect(modulePathFor('src/bin/tool/opts/mod.rs')).toBe('bin::tool::opts');
  });

  it('maps plain files and mod.rs files to their module', () => {
    expect(modulePathFor('src/net.rs')).toBe('crate::net');
    expect(modulePathFor('src/net/mod.rs')).toBe('crate::net');
    expect(modulePathFor('src/net/tcp.rs')).toBe('crate::net::tcp');
  });

  it('keeps nested lib and main files as ordinary modules', () => {
    expect(modulePathFor('src/net/main.rs')).toBe('crate::net::main');
    expect(modulePathFor('src/net/lib.rs')).toBe('crate::net::lib');
  });

  it('accepts Windows separators and sanitizes segments', () => {
    expect(modulePathFor('src\\net\\tcp.rs')).toBe('crate::net::tcp');
    expect(modulePathFor('src/my-mod.rs')).toBe('crate::my_mod');
  });
});

describe('path helpers', () => {
  it('joins non-empty parts', () => {
    expect(joinPath('crate', '', 'net', 'Socket')).toBe('crate::net::Socket');
    expect(joinPath('', 'Socket')).toBe('Socket');
  });

  it('splits parent and last segment', () => {
    expect(parentModule('crate::net::tcp')).toBe('crate::net');
    expect(parentModule('crate')).toBe('crate');
    expect(lastSegment('crate::net::Socket')).toBe('Socket');
    expect(lastSegment('Socket')).toBe('Socket');
  });
});

describe('absoluteCandidates', () => {
  it('returns crate paths unchanged', () => {
    expect(absoluteCandidates('crate::a::Widget', 'crate::b')).toEqual(['crate::a::Widget']);
  });

  it('anchors self paths at the current module', () => {
    expect(absoluteCandidates('self::memory::Store', 'crate::store')).toEqual(['crate::store::memory::Store']);
  });

  it('climbs one module per super', () => {
    expect(absoluteCandidates('super::Store', 'crate::store::memory')).toEqual(['crate::store::Store']);
    expect(absoluteCandidates('super::super::Item', 'crate::a::b')).toEqual(['crate::Item']);
  });

  it('tries relative, crate-rooted and external readings of plain paths', () => {
    expect(absoluteCandidates('model::Item', 'crate::service')).toEqual([
      'crate::service::model::Item',
      'crate::model::Item',
      'model::Item',
    ]);
    expect(absoluteCandidates('model::Item', 'crate')).toEqual(['crate::model::Item', 'model::Item']);
  });

  it('reads crate paths in a binary against its own root first', () => {
    expect(absoluteCandidates('crate::config::Config', 'main')).toEqual([
      'main::config::Config',
      'crate::config::Config',
    ]);
    expect(absoluteCandidates('Config', 'bin::tool::args')).toEqual([
      'bin::tool::args::Config',
      'bin::tool::Config',
      'crate::Config',
      'Config',
    ]);
  });

  it('returns nothing for an empty path', () => {
    expect(absoluteCandidates('', 'crate')).toEqual([]);
  });
});

describe('crateRootOf', () => {
  it('finds the crate root of a module path', () => {
    expect(crateRootOf('crate::net::tcp')).toBe('crate');
    expect(crateRootOf('main')).toBe('main');
    expect(crateRootOf('bin::tool::args')).toBe('bin::tool');
  });
});
