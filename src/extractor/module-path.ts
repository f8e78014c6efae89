/**
 * Rust module path derivation and path arithmetic
 */

/**
 * Derive the module path of a source file from its root-relative path.
 *
 * `src/lib.rs` -> `crate`, `src/net/mod.rs` -> `crate::net`,
 * `src/net/tcp.rs` -> `crate::net::tcp`.
 *
 * Binary crate roots get their own prefix so their types never collide with
 * the library's: `src/main.rs` -> `main`, `src/bin/tool.rs` and
 * `src/bin/tool/main.rs` -> `bin::tool`.
 */
export function modulePathFor(relativePath: string): string {
  const segments = relativePath
    .replace(/\\/g, '/')
    .replace(/\.rs$/, '')
    .split('/')
    .filter(s => s.length > 0 && s !== '.')
    .map(sanitizeSegment);

  if (segments[0] === 'src') {
    segments.shift();
  }

  if (segments.length === 1 && segments[0] === 'main') {
    return 'main';
  }

  if (segments[0] === 'bin' && segments.length >= 2) {
    const rest = segments.slice(2);
    if (rest.length === 1 && rest[0] === 'main') rest.pop();
    if (rest[rest.length - 1] === 'mod') rest.pop();
    return joinPath('bin', segments[1] ?? '', ...rest);
  }

  const last = segments[segments.length - 1];
  if (last === 'mod') {
    segments.pop();
  } else if (segments.length === 1 && last === 'lib') {
    segments.pop();
  }

  return ['crate', ...segments].join('::');
}

/**
 * Crate root a module belongs to: `main`, `bin::<name>` or `crate`
 */
export function crateRootOf(modulePath: string): string {
  const segments = modulePath.split('::');
  if (segments[0] === 'main') return 'main';
  if (segments[0] === 'bin' && segments.length >= 2) return `bin::${segments[1]}`;
  return 'crate';
}

function sanitizeSegment(segment: string): string {
  return segment.replace(/[^A-Za-z0-9_]/g, '_');
}

export function joinPath(...parts: string[]): string {
  return parts.filter(p => p.length > 0).join('::');
}

export function parentModule(modulePath: string): string {
  const idx = modulePath.lastIndexOf('::');
  return idx === -1 ? modulePath : modulePath.slice(0, idx);
}

export function lastSegment(path: string): string {
  const idx = path.lastIndexOf('::');
  return idx === -1 ? path : path.slice(idx + 2);
}

/**
 * Expand a relative `use`/type path against the module it appears in.
 * Returns every absolute candidate in lookup order. `crate::` reads against
 * the module's own crate root first, then the library root.
 */
export function absoluteCandidates(path: string, modulePath: string): string[] {
  const segments = path.split('::').filter(s => s.length > 0);
  if (segments.length === 0) return [];

  const root = crateRootOf(modulePath);
  const head = segments[0];
  if (head === 'crate') {
    const rest = segments.slice(1);
    return unique([joinPath(root, ...rest), joinPath('crate', ...rest)]);
  }
  if (head === 'self') {
    return [joinPath(modulePath, ...segments.slice(1))];
  }
  if (head === 'super') {
    let base = modulePath;
    let i = 0;
    while (segments[i] === 'super') {
      base = parentModule(base);
      i++;
    }
    return [joinPath(base, ...segments.slice(i))];
  }

  const joined = segments.join('::');
  return unique([joinPath(modulePath, joined), `${root}::${joined}`, `crate::${joined}`, joined]);
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
