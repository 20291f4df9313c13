import type { PythonParser, SyntaxNode } from '../parser/python-parser.js';
import { classifyModule, findDefinition } from '../parser/syntax.js';
import { hashBytes, hashFile, readSourceText } from './hash.js';

// ── Canonical serialization ──

const IGNORED_TYPES = new Set(['comment', 'line_continuation']);
const PUNCTUATION = new Set([',', '(', ')', '[', ']', '{', '}', ':', ';']);

/** Node types whose identifiers (recursively) are bound as assignment targets. */
const TARGET_CONTAINERS = new Set([
  'pattern_list',
  'tuple_pattern',
  'list_pattern',
  'tuple',
  'list',
  'expression_list',
  'parenthesized_expression',
  'as_pattern_target',
  'list_splat_pattern',
  'dictionary_splat_pattern',
  'list_splat',
]);

/** Nested scopes whose bodies do not bind names in the enclosing function. */
const SCOPE_BOUNDARIES = new Set(['function_definition', 'class_definition', 'lambda']);

const STRING_LITERAL = /^([A-Za-z]*)('''|"""|'|")([\s\S]*)\2$/;

/**
 * Serializes a syntax subtree to a canonical string: node types and token
 * text only, no positions, comments, punctuation, docstrings or local
 * variable names.
 */
class Canonicalizer {
  private readonly scopes: Map<string, string>[] = [];

  serialize(node: SyntaxNode, parent: SyntaxNode | null): string {
    if (IGNORED_TYPES.has(node.type)) {
      return '';
    }
    if (!node.isNamed && PUNCTUATION.has(node.type) && parent?.type !== 'slice') {
      return '';
    }

    switch (node.type) {
      case 'identifier':
        return `id:${this.rename(node.text)}`;
      case 'string':
        return this.serializeString(node);
      case 'parenthesized_expression': {
        const inner = node.namedChildren.filter((child) => !IGNORED_TYPES.has(child.type));
        if (inner.length === 1 && inner[0]) {
          return this.serialize(inner[0], node);
        }
        return this.serializeChildren(node);
      }
      case 'function_definition':
        return this.serializeFunction(node);
      case 'class_definition':
        return this.serializeChildren(node, node.childForFieldName('body'));
      default:
        return this.serializeChildren(node);
    }
  }

  /**
   * `docstringBlock` is the body block of a function or class, whose leading
   * string statement is dropped.
   */
  private serializeChildren(node: SyntaxNode, docstringBlock: SyntaxNode | null = null): string {
    if (node.childCount === 0) {
      return node.type === node.text ? node.type : `${node.type}:${node.text}`;
    }

    // Attribute names and keyword-argument names are never local variables.
    const literalName =
      node.type === 'attribute'
        ? node.childForFieldName('attribute')
        : node.type === 'keyword_argument'
          ? node.childForFieldName('name')
          : null;
    const docstring = node.type === 'block' ? null : docstringBlock;

    const parts: string[] = [];
    for (const child of node.children) {
      let part: string;
      if (literalName && child.id === literalName.id) {
        part = `id:${child.text}`;
      } else if (docstring && child.id === docstring.id) {
        part = this.serializeBody(child);
      } else {
        part = this.serialize(child, node);
      }
      if (part !== '') {
        parts.push(part);
      }
    }
    return `${node.type}(${parts.join(' ')})`;
  }

  /** A function or class body with its docstring, if any, left out. */
  private serializeBody(block: SyntaxNode): string {
    const docstring = leadingDocstring(block);
    const parts: string[] = [];
    for (const child of block.children) {
      if (docstring && child.id === docstring.id) {
        continue;
      }
      const part = this.serialize(child, block);
      if (part !== '') {
        parts.push(part);
      }
    }
    return `block(${parts.join(' ')})`;
  }

  private serializeFunction(node: SyntaxNode): string {
    const body = node.childForFieldName('body');
    const parts: string[] = [];

    for (const child of node.children) {
      let part: string;
      if (body && child.id === body.id) {
        // Name, decorators, parameters and annotations use the outer scope.
        this.scopes.push(this.numberLocals(node, body));
        try {
          part = this.serializeBody(child);
        } finally {
          this.scopes.pop();
        }
      } else {
        part = this.serialize(child, node);
      }
      if (part !== '') {
        parts.push(part);
      }
    }
    return `function_definition(${parts.join(' ')})`;
  }

  private serializeString(node: SyntaxNode): string {
    const start = node.children.find((child) => child.type === 'string_start');
    if (!start) {
      const match = STRING_LITERAL.exec(node.text);
      if (!match) {
        return `string:${node.text}`;
      }
      return `string:${(match[1] ?? '').toLowerCase()}|${match[3] ?? ''}`;
    }

    const prefix = start.text.replace(/['"]+$/, '').toLowerCase();
    let content = '';
    for (const child of node.children) {
      switch (child.type) {
        case 'string_start':
        case 'string_end':
          break;
        case 'interpolation':
          content += `{${this.serialize(child, node)}}`;
          break;
        default:
          content += child.text;
      }
    }
    return `string:${prefix}|${content}`;
  }

  private rename(name: string): string {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const placeholder = this.scopes[i]?.get(name);
      if (placeholder) {
        return placeholder;
      }
    }
    return name;
  }

  /** Placeholders for the function's locals, numbered by first binding. */
  private numberLocals(fn: SyntaxNode, body: SyntaxNode): Map<string, string> {
    const excluded = new Set(parameterNames(fn.childForFieldName('parameters')));
    const bound: string[] = [];

    walkScope(body, (node) => {
      if (node.type === 'global_statement' || node.type === 'nonlocal_statement') {
        for (const child of node.namedChildren) {
          if (child.type === 'identifier') excluded.add(child.text);
        }
      } else {
        bound.push(...bindingsOf(node));
      }
    });

    const depth = this.scopes.length + 1;
    const locals = new Map<string, string>();
    for (const name of bound) {
      if (!excluded.has(name) && !locals.has(name)) {
        locals.set(name, `local${depth}_${locals.size}`);
      }
    }
    return locals;
  }
}

function leadingDocstring(block: SyntaxNode): SyntaxNode | null {
  const first = block.namedChildren.find((child) => !IGNORED_TYPES.has(child.type));
  if (first?.type !== 'expression_statement') {
    return null;
  }
  const expressions = first.namedChildren.filter((child) => !IGNORED_TYPES.has(child.type));
  return expressions.length === 1 && expressions[0]?.type === 'string' ? first : null;
}

// ── Binding analysis ──

/** Pre-order walk of a function body that does not enter nested scopes. */
function walkScope(node: SyntaxNode, visit: (node: SyntaxNode) => void): void {
  for (const child of node.namedChildren) {
    visit(child);
    if (!SCOPE_BOUNDARIES.has(child.type)) {
      walkScope(child, visit);
    }
  }
}

function bindingsOf(node: SyntaxNode): string[] {
  switch (node.type) {
    case 'assignment':
    case 'augmented_assignment':
    case 'for_statement':
    case 'for_in_clause':
      return targetNames(node.childForFieldName('left'));
    case 'named_expression':
      return targetNames(node.childForFieldName('name'));
    case 'as_pattern':
      return targetNames(node.childForFieldName('alias'));
    case 'except_clause':
      return targetNames(exceptAlias(node));
    case 'function_definition':
    case 'class_definition':
      return targetNames(node.childForFieldName('name'));
    default:
      return [];
  }
}

/** The name bound by `except E as name`, if any. */
function exceptAlias(node: SyntaxNode): SyntaxNode | null {
  let afterAs = false;
  for (const child of node.children) {
    if (child.type === 'as') {
      afterAs = true;
    } else if (afterAs && child.isNamed) {
      return child;
    }
  }
  return null;
}

function targetNames(target: SyntaxNode | null): string[] {
  if (!target) {
    return [];
  }
  if (target.type === 'identifier') {
    return [target.text];
  }
  if (TARGET_CONTAINERS.has(target.type)) {
    return target.namedChildren.flatMap((child) => targetNames(child));
  }
  return [];
}

function parameterNames(parameters: SyntaxNode | null): string[] {
  const names: string[] = [];
  for (const param of parameters?.namedChildren ?? []) {
    switch (param.type) {
      case 'identifier':
        names.push(param.text);
        break;
      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = param.childForFieldName('name');
        if (name) names.push(name.text);
        break;
      }
      case 'typed_parameter':
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
        names.push(...parameterNames(param));
        break;
      default:
        break;
    }
  }
  return names;
}

// ── Public API ──

/** Canonical form of a definition subtree; exported for tests and debugging. */
export function canonicalize(node: SyntaxNode): string {
  return new Canonicalizer().serialize(node, null);
}

/**
 * Structural fingerprint of `name` (a top-level name or `Class.method`) in
 * `content`. Null when the source does not parse or does not define it.
 */
export function fingerprintSymbol(
  content: string,
  name: string,
  parser: PythonParser,
): string | null {
  return parser.withModule(content, (module) => {
    const site = findDefinition(classifyModule(module), name);
    return site ? hashBytes(canonicalize(site.outer)) : null;
  });
}

/**
 * Hash used for symbol links: the structural fingerprint, falling back to the
 * whole-file hash. Null when neither can be computed.
 */
export async function hashSymbol(
  absPath: string,
  name: string,
  parser: PythonParser,
): Promise<string | null> {
  const content = await readSourceText(absPath);
  const fingerprint = content === null ? null : fingerprintSymbol(content, name, parser);
  return fingerprint ?? hashFile(absPath);
}
