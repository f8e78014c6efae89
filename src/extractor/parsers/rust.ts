/**
 * Rust parser using tree-sitter
 */

import Parser from 'tree-sitter';
import Rust from 'tree-sitter-rust';

import type {
  CallSite,
  FieldDefinition,
  ImplBlock,
  Import,
  Location,
  Method,
  SourceUnit,
  TypeDefinition,
  TypeKind,
  Visibility,
} from '../../types/index.js';

import { LanguageParser, type ParserOptions } from './base.js';
import { checkDelimiters, type TreeSitterNode } from './syntax-node.js';
import { joinPath, modulePathFor } from '../module-path.js';
import { normalizeWhitespace, stripGenerics, traitRefOf, typePathOf } from '../type-names.js';

interface ItemContext {
  filePath: string;
  modulePath: string;
}

const SIMPLE_PATH = /^[A-Za-z_]\w*(?:(?:::|\.)(?:[A-Za-z_]\w*|\d+))*$/;
const NON_TYPE_CHILDREN = new Set(['attribute_item', 'visibility_modifier', 'line_comment', 'block_comment']);

export class RustParser extends LanguageParser {
  private parser: Parser;

  constructor(options: ParserOptions = {}) {
    super(options);
    this.parser = new Parser();
    this.parser.setLanguage(Rust);
  }

  get extensions(): string[] {
    return ['rs'];
  }

  parseFile(filePath: string, content: string, modulePath = modulePathFor(filePath)): SourceUnit {
    // Strings above 32K characters need an explicit buffer in the node bindings
    const tree = this.parser.parse(content, undefined, {
      bufferSize: Math.max(32 * 1024, content.length * 2),
    });
    const root = tree.rootNode as unknown as TreeSitterNode;

    checkDelimiters(root, filePath);

    const unit = this.emptyUnit(filePath, modulePath);
    this.collectItems(root, { filePath, modulePath }, unit);
    unit.imports = dedupeImports(unit.imports);

    return unit;
  }

  private collectItems(node: TreeSitterNode, ctx: ItemContext, unit: SourceUnit): void {
    for (const child of node.namedChildren) {
      switch (child.type) {
        case 'struct_item':
        case 'union_item': {
          const def = this.parseStruct(child, ctx);
          if (def) unit.types.push(def);
          break;
        }
        case 'enum_item': {
          const def = this.parseEnum(child, ctx);
          if (def) unit.types.push(def);
          break;
        }
        case 'trait_item': {
          const def = this.parseTrait(child, ctx, unit);
          if (def) unit.types.push(def);
          break;
        }
        case 'impl_item': {
          const impl = this.parseImpl(child, ctx);
          if (impl) unit.impls.push(impl);
          break;
        }
        case 'use_declaration': {
          const argument = child.childForFieldName('argument');
          if (argument) this.collectUse(argument, '', unit.imports);
          break;
        }
        case 'mod_item': {
          const name = child.childForFieldName('name');
          const body = child.childForFieldName('body');
          if (name && body) {
            this.collectItems(body, { ...ctx, modulePath: joinPath(ctx.modulePath, name.text) }, unit);
          }
          break;
        }
        default:
          // Free functions, macros, consts and anything unrecognized carry no structure
          break;
      }
    }
  }

  private parseStruct(node: TreeSitterNode, ctx: ItemContext): TypeDefinition | null {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return null;

    const fields = this.parseFields(node.childForFieldName('body'));
    return this.typeDefinition(node, nameNode.text, 'struct', fields, ctx);
  }

  private parseEnum(node: TreeSitterNode, ctx: ItemContext): TypeDefinition | null {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return null;

    const body = node.childForFieldName('body');
    const variants: FieldDefinition[] = [];
    for (const variant of body?.namedChildren ?? []) {
      if (variant.type !== 'enum_variant') continue;
      const variantName = variant.childForFieldName('name');
      if (!variantName) continue;
      const payload = variant.childForFieldName('body');
      variants.push({
        name: variantName.text,
        type: payload ? normalizeWhitespace(payload.text) : '',
      });
    }

    return this.typeDefinition(node, nameNode.text, 'enum', variants, ctx);
  }

  /**
   * Traits become a type definition plus an implicit impl holding their methods
   */
  private parseTrait(node: TreeSitterNode, ctx: ItemContext, unit: SourceUnit): TypeDefinition | null {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return null;

    const body = node.childForFieldName('body');
    const methods = (body?.namedChildren ?? [])
      .filter(c => c.type === 'function_item' || c.type === 'function_signature_item')
      .map(fn => this.parseMethod(fn, ctx, 'public'));

    if (methods.length > 0) {
      unit.impls.push({
        target: nameNode.text,
        trait: null,
        methods,
        location: this.locationOf(node, ctx),
      });
    }

    return this.typeDefinition(node, nameNode.text, 'trait', [], ctx);
  }

  private parseImpl(node: TreeSitterNode, ctx: ItemContext): ImplBlock | null {
    const typeNode = node.childForFieldName('type');
    if (!typeNode) return null;

    const traitNode = node.childForFieldName('trait');
    const trait = traitNode ? traitRefOf(traitNode.text) : null;
    const body = node.childForFieldName('body');

    // Trait impl methods are as visible as the trait itself
    const implied: Visibility | undefined = trait ? 'public' : undefined;
    const methods = (body?.namedChildren ?? [])
      .filter(c => c.type === 'function_item')
      .map(fn => this.parseMethod(fn, ctx, implied));

    return {
      target: typePathOf(typeNode.text),
      trait,
      methods,
      location: this.locationOf(node, ctx),
    };
  }

  private parseMethod(node: TreeSitterNode, ctx: ItemContext, implied?: Visibility): Method {
    const name = node.childForFieldName('name')?.text ?? '';
    const body = node.childForFieldName('body');
    const returnNode = node.childForFieldName('return_type');

    const text = node.text;
    const head = body ? text.slice(0, text.length - body.text.length) : text.replace(/;\s*$/, '');

    return {
      name,
      signature: normalizeWhitespace(head),
      returnType: returnNode ? normalizeWhitespace(returnNode.text) : null,
      visibility: implied ?? this.visibilityOf(node),
      calls: body ? this.collectCalls(body) : [],
      location: this.locationOf(node, ctx),
    };
  }

  private parseFields(body: TreeSitterNode | null): FieldDefinition[] {
    if (!body) return [];

    if (body.type === 'field_declaration_list') {
      const fields: FieldDefinition[] = [];
      for (const decl of body.namedChildren) {
        if (decl.type !== 'field_declaration') continue;
        const name = decl.childForFieldName('name');
        const type = decl.childForFieldName('type');
        if (name && type) {
          fields.push({ name: name.text, type: normalizeWhitespace(type.text) });
        }
      }
      return fields;
    }

    if (body.type === 'ordered_field_declaration_list') {
      return body.namedChildren
        .filter(c => !NON_TYPE_CHILDREN.has(c.type))
        .map((type, index) => ({ name: String(index), type: normalizeWhitespace(type.text) }));
    }

    return [];
  }

  /**
   * Call expressions in document order, outer calls before the calls in their arguments
   */
  private collectCalls(body: TreeSitterNode): CallSite[] {
    const calls: CallSite[] = [];

    const visit = (node: TreeSitterNode): void => {
      if (node.type === 'call_expression') {
        const fn = node.childForFieldName('function');
        const callee = fn ? this.calleeText(fn) : null;
        if (callee) {
          calls.push({
            callee,
            method: lastCalleeSegment(callee),
            target: null,
            line: node.startPosition.row + 1,
          });
        }
      }
      for (const child of node.namedChildren) {
        visit(child);
      }
    };

    visit(body);
    return calls;
  }

  private calleeText(fn: TreeSitterNode): string | null {
    if (fn.type === 'generic_function') {
      const inner = fn.childForFieldName('function');
      return inner ? this.calleeText(inner) : null;
    }

    if (fn.type === 'field_expression') {
      const value = fn.childForFieldName('value');
      const field = fn.childForFieldName('field');
      if (!value || !field) return null;
      const receiver = stripGenerics(value.text);
      return `${SIMPLE_PATH.test(receiver) ? receiver : '<expr>'}.${field.text}`;
    }

    const path = stripGenerics(fn.text);
    return SIMPLE_PATH.test(path) ? path : null;
  }

  private collectUse(node: TreeSitterNode, prefix: string, out: Import[]): void {
    switch (node.type) {
      case 'use_as_clause': {
        const path = node.childForFieldName('path');
        const alias = node.childForFieldName('alias');
        if (path) out.push({ path: importPath(prefix, path.text), alias: alias?.text ?? null });
        return;
      }
      case 'scoped_use_list': {
        const path = node.childForFieldName('path');
        const list = node.childForFieldName('list');
        const next = path ? importPath(prefix, path.text) : prefix;
        if (list) this.collectUse(list, next, out);
        return;
      }
      case 'use_list':
        for (const child of node.namedChildren) {
          this.collectUse(child, prefix, out);
        }
        return;
      case 'line_comment':
      case 'block_comment':
        return;
      default:
        out.push({ path: importPath(prefix, node.text), alias: null });
    }
  }

  private typeDefinition(
    node: TreeSitterNode,
    name: string,
    kind: TypeKind,
    fields: FieldDefinition[],
    ctx: ItemContext
  ): TypeDefinition {
    return {
      name,
      qualifiedName: joinPath(ctx.modulePath, name),
      kind,
      visibility: this.visibilityOf(node),
      fields,
      location: this.locationOf(node, ctx),
    };
  }

  private visibilityOf(node: TreeSitterNode): Visibility {
    const modifier = node.namedChildren.find(c => c.type === 'visibility_modifier');
    if (!modifier) return 'private';

    const text = modifier.text.replace(/\s+/g, '');
    if (text === 'pub') return 'public';
    if (text === 'pub(crate)' || text === 'crate') return 'crate';
    return 'restricted';
  }

  private locationOf(node: TreeSitterNode, ctx: ItemContext): Location {
    return {
      filePath: ctx.filePath,
      startLine: node.startPosition.row + 1,
      endLine: node.endPosition.row + 1,
    };
  }
}

function importPath(prefix: string, text: string): string {
  return joinPath(prefix, text.replace(/\s+/g, ''))
    .replace(/^::/, '')
    .replace(/::self$/, '')
    .replace(/^self$/, '');
}

function lastCalleeSegment(callee: string): string {
  const parts = callee.split(/::|\./);
  return parts[parts.length - 1] ?? callee;
}

function dedupeImports(imports: Import[]): Import[] {
  const seen = new Set<string>();
  return imports.filter(imp => {
    const key = `${imp.path}|${imp.alias ?? ''}`;
    if (imp.path.length === 0 || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
