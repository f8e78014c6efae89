/**
 * Helpers for working with Rust type and path text without a type checker
 */

import { lastSegment } from './module-path.js';

export interface TypeRef {
  path: string;
  many: boolean;
}

// Wrappers whose generic arguments are the "real" type
const WRAPPERS = new Set([
  'Option', 'Result', 'Box', 'Arc', 'Rc', 'Weak', 'Cell', 'RefCell', 'Mutex', 'RwLock',
  'Cow', 'Pin', 'PhantomData', 'MaybeUninit', 'ManuallyDrop',
]);

const COLLECTIONS = new Set([
  'Vec', 'VecDeque', 'LinkedList', 'BinaryHeap', 'HashMap', 'HashSet', 'BTreeMap',
  'BTreeSet', 'IndexMap', 'IndexSet', 'SmallVec',
]);

const PRIMITIVES = new Set([
  'u8', 'u16', 'u32', 'u64', 'u128', 'usize', 'i8', 'i16', 'i32', 'i64', 'i128', 'isize',
  'f32', 'f64', 'bool', 'char', 'str', 'String', 'Self', 'self',
]);

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Remove generic argument lists: `Repo<T>::new` -> `Repo::new`,
 * `<Widget as Default>::default` -> `Widget::default`.
 */
export function stripGenerics(text: string): string {
  let source = normalizeWhitespace(text);
  const qualifiedSelf = /^<\s*([^<>]+?)\s+as\s+[^>]+>/.exec(source);
  if (qualifiedSelf) {
    source = qualifiedSelf[1] + source.slice(qualifiedSelf[0].length);
  }

  let depth = 0;
  let out = '';
  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === '<') {
      depth++;
    } else if (ch === '>' && source[i - 1] !== '-') {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0) {
      out += ch;
    }
  }

  return out.replace(/\s*(::|\.)\s*/g, '$1').replace(/::(?=::|$)/g, '').trim();
}

/**
 * Path of a type as written in an impl header or signature: `&'a mut Repo<T>` -> `Repo`.
 */
export function typePathOf(text: string): string {
  return stripGenerics(stripQualifiers(normalizeWhitespace(text)));
}

/**
 * Generic argument list of a path as written, spacing normalized:
 * `From< Vec<T> >` -> `<Vec<T>>`. Empty when the path has none or its
 * arguments are parenthesized (`Fn(u8) -> u8`).
 */
export function genericArgsOf(text: string): string {
  const t = stripQualifiers(normalizeWhitespace(text));
  const open = t.indexOf('<');
  const paren = t.indexOf('(');
  if (open <= 0 || !t.endsWith('>') || (paren !== -1 && paren < open)) return '';

  return t
    .slice(open)
    .replace(/\s*<\s*/g, '<')
    .replace(/\s+>/g, '>')
    .replace(/\s*,\s*/g, ', ');
}

/**
 * Trait reference with its generic arguments kept, so `From<A>` and
 * `From<B>` stay distinct: `&dyn io::Read` -> `io::Read`.
 */
export function traitRefOf(text: string): string {
  return typePathOf(text) + genericArgsOf(text);
}

/**
 * Split on a separator that is not nested inside any bracket pair.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '<' || ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if ((ch === '>' && text[i - 1] !== '-') || ch === ')' || ch === ']' || ch === '}') {
      depth--;
    } else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));

  return parts.map(p => p.trim()).filter(p => p.length > 0);
}

function stripQualifiers(text: string): string {
  let t = text.trim();
  let previous = '';
  while (t !== previous) {
    previous = t;
    t = t
      .replace(/^&/, '')
      .replace(/^'\w+\s*/, '')
      .replace(/^(mut|dyn|impl|const)\s+/, '')
      .replace(/^\*(const|mut)\s+/, '')
      .trim();
  }
  return t;
}

/**
 * Every named type mentioned by a declared type, with wrappers removed.
 *
 * `Option<Arc<Engine>>` -> Engine, `HashMap<Id, Vec<Wheel>>` -> Id (many), Wheel (many).
 */
export function innerTypeRefs(typeText: string): TypeRef[] {
  const found = new Map<string, boolean>();
  collectTypeRefs(normalizeWhitespace(typeText), false, found);
  return Array.from(found, ([path, many]) => ({ path, many }));
}

function collectTypeRefs(text: string, many: boolean, found: Map<string, boolean>): void {
  const t = stripQualifiers(text);
  if (t.length === 0 || t.startsWith("'")) return;

  const bounds = splitTopLevel(t, '+');
  if (bounds.length > 1) {
    for (const bound of bounds) collectTypeRefs(bound, many, found);
    return;
  }

  if (t.startsWith('(') && t.endsWith(')')) {
    for (const part of splitTopLevel(t.slice(1, -1), ',')) collectTypeRefs(part, many, found);
    return;
  }

  // Struct-like enum variant payload: `{ x: Point, y: i32 }`
  if (t.startsWith('{') && t.endsWith('}')) {
    for (const member of splitTopLevel(t.slice(1, -1), ',')) {
      const colon = member.indexOf(':');
      if (colon !== -1 && member[colon + 1] !== ':') {
        collectTypeRefs(member.slice(colon + 1), many, found);
      }
    }
    return;
  }

  if (t.startsWith('[') && t.endsWith(']')) {
    const [element] = splitTopLevel(t.slice(1, -1), ';');
    if (element) collectTypeRefs(element, true, found);
    return;
  }

  const open = t.indexOf('<');
  const base = (open === -1 ? t : t.slice(0, open)).trim();
  // Function pointers and closures are not structural relationships
  if (base.includes('(') || base === 'fn') return;

  const args = open === -1 ? [] : splitTopLevel(t.slice(open + 1, t.lastIndexOf('>')), ',');
  const name = lastSegment(base);

  // A bare `Cell` or `Result` is a user type that shares a std name
  if (args.length > 0 && (WRAPPERS.has(name) || COLLECTIONS.has(name))) {
    const argMany = many || COLLECTIONS.has(name);
    for (const arg of args) collectTypeRefs(associatedValue(arg), argMany, found);
    return;
  }

  if (/^[A-Za-z_]\w*$/.test(name) && !PRIMITIVES.has(name)) {
    found.set(base, (found.get(base) ?? false) || many);
  }

  for (const arg of args) collectTypeRefs(associatedValue(arg), many, found);
}

function associatedValue(arg: string): string {
  const parts = splitTopLevel(arg, '=');
  return parts[parts.length - 1] ?? arg;
}
