import type { SyntaxNode } from './python-parser.js';

/**
 * A function or method definition. `outer` is the `decorated_definition`
 * wrapping it when it carries decorators, otherwise the definition itself.
 */
export interface FunctionDefinition {
  kind: 'function';
  name: string;
  node: SyntaxNode;
  outer: SyntaxNode;
}

export interface ClassDefinition {
  kind: 'class';
  name: string;
  node: SyntaxNode;
  outer: SyntaxNode;
  /** Functions defined directly in the class body, in source order. */
  methods: FunctionDefinition[];
}

/** A module-level assignment binding one or more upper-case names. */
export interface ConstantDefinition {
  kind: 'constant';
  names: string[];
  node: SyntaxNode;
}

export interface OtherStatement {
  kind: 'other';
  node: SyntaxNode;
}

export type TopLevelStatement =
  | FunctionDefinition
  | ClassDefinition
  | ConstantDefinition
  | OtherStatement;

/** Where a named symbol lives in a parsed module. */
export interface DefinitionSite {
  /** The `def`/`class`/assignment statement itself. */
  node: SyntaxNode;
  /** Node the fingerprint covers (includes decorators). */
  outer: SyntaxNode;
}

/**
 * Classify every top-level statement of a module. Statements nested in `if`,
 * `try` or similar blocks are `other`: only the module body is scanned.
 */
export function classifyModule(module: SyntaxNode): TopLevelStatement[] {
  return module.namedChildren.map((statement) => classifyStatement(statement));
}

function classifyStatement(statement: SyntaxNode): TopLevelStatement {
  switch (statement.type) {
    case 'function_definition':
      return toFunction(statement, statement) ?? { kind: 'other', node: statement };
    case 'class_definition':
      return toClass(statement, statement) ?? { kind: 'other', node: statement };
    case 'decorated_definition': {
      const definition = statement.childForFieldName('definition');
      if (definition?.type === 'function_definition') {
        return toFunction(definition, statement) ?? { kind: 'other', node: statement };
      }
      if (definition?.type === 'class_definition') {
        return toClass(definition, statement) ?? { kind: 'other', node: statement };
      }
      return { kind: 'other', node: statement };
    }
    case 'expression_statement': {
      const names = constantNames(statement);
      return names.length > 0
        ? { kind: 'constant', names, node: statement }
        : { kind: 'other', node: statement };
    }
    default:
      return { kind: 'other', node: statement };
  }
}

function toFunction(node: SyntaxNode, outer: SyntaxNode): FunctionDefinition | null {
  const name = node.childForFieldName('name')?.text;
  return name ? { kind: 'function', name, node, outer } : null;
}

function toClass(node: SyntaxNode, outer: SyntaxNode): ClassDefinition | null {
  const name = node.childForFieldName('name')?.text;
  if (!name) {
    return null;
  }

  const methods: FunctionDefinition[] = [];
  const body = node.childForFieldName('body');
  for (const item of body?.namedChildren ?? []) {
    if (item.type === 'function_definition') {
      const method = toFunction(item, item);
      if (method) methods.push(method);
    } else if (item.type === 'decorated_definition') {
      const definition = item.childForFieldName('definition');
      if (definition?.type === 'function_definition') {
        const method = toFunction(definition, item);
        if (method) methods.push(method);
      }
    }
  }

  return { kind: 'class', name, node, outer, methods };
}

/**
 * Upper-case names bound by `NAME = ...`, `NAME: T = ...` or a chain such as
 * `A = B = ...`. Tuple targets and attribute targets bind nothing here.
 */
function constantNames(statement: SyntaxNode): string[] {
  const names: string[] = [];
  let assignment: SyntaxNode | null =
    statement.namedChildren.find((child) => child.type === 'assignment') ?? null;

  while (assignment && assignment.type === 'assignment') {
    const left = assignment.childForFieldName('left');
    if (left?.type === 'identifier' && isConstantName(left.text)) {
      names.push(left.text);
    }
    assignment = assignment.childForFieldName('right');
  }

  return names;
}

/** At least one cased letter and no lower-case ones, e.g. `MAX_SIZE`, `V2`. */
export function isConstantName(name: string): boolean {
  return /[A-Z]/.test(name) && !/[a-z]/.test(name);
}

/**
 * Locate `name` among the classified statements. `Class.method` names resolve
 * to a method defined directly in that class. Later definitions win, matching
 * the binding Python itself would keep.
 */
export function findDefinition(
  statements: TopLevelStatement[],
  name: string,
): DefinitionSite | null {
  const parts = name.split('.');
  let found: DefinitionSite | null = null;

  for (const statement of statements) {
    switch (statement.kind) {
      case 'function':
        if (parts.length === 1 && statement.name === name) {
          found = { node: statement.node, outer: statement.outer };
        }
        break;
      case 'class':
        if (parts.length === 1 && statement.name === name) {
          found = { node: statement.node, outer: statement.outer };
        } else if (parts.length === 2 && statement.name === parts[0]) {
          const method = statement.methods.filter((m) => m.name === parts[1]).pop();
          if (method) {
            found = { node: method.node, outer: method.outer };
          }
        }
        break;
      case 'constant':
        if (parts.length === 1 && statement.names.includes(name)) {
          found = { node: statement.node, outer: statement.node };
        }
        break;
      case 'other':
        break;
      default:
        assertNever(statement);
    }
  }

  return found;
}

/**
 * Best-effort `def name(a: int, *args, **kwargs) -> str` rendering. Parameter
 * defaults are left out; annotations are kept with whitespace collapsed.
 */
export function functionSignature(node: SyntaxNode): string {
  const name = node.childForFieldName('name')?.text ?? '';
  const parameters = node.childForFieldName('parameters');
  const rendered = (parameters?.namedChildren ?? [])
    .filter((param) => param.type !== 'comment')
    .map(renderParameter);

  const prefix = node.children.some((child) => child.type === 'async') ? 'async def' : 'def';
  let signature = `${prefix} ${name}(${rendered.join(', ')})`;

  const returnType = node.childForFieldName('return_type');
  if (returnType) {
    signature += ` -> ${collapseWhitespace(returnType.text)}`;
  }

  return signature;
}

function renderParameter(param: SyntaxNode): string {
  switch (param.type) {
    case 'typed_parameter': {
      const head = param.namedChildren[0];
      const type = param.childForFieldName('type');
      const headText = head ? head.text : '';
      return type ? `${headText}: ${collapseWhitespace(type.text)}` : headText;
    }
    case 'default_parameter':
      return param.childForFieldName('name')?.text ?? collapseWhitespace(param.text);
    case 'typed_default_parameter': {
      const paramName = param.childForFieldName('name')?.text ?? '';
      const type = param.childForFieldName('type');
      return type ? `${paramName}: ${collapseWhitespace(type.text)}` : paramName;
    }
    case 'keyword_separator':
      return '*';
    case 'positional_separator':
      return '/';
    default:
      return collapseWhitespace(param.text);
  }
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled statement variant: ${JSON.stringify(value)}`);
}
