/**
 * Structural extraction of Python entities. The file is parsed with
 * tree-sitter and walked top-down with the enclosing class passed along as
 * context. Module bodies, class bodies and decorated definitions are
 * entered; function bodies and compound statements are not, so only
 * module-level and class-level facts are recorded.
 */

import { EntityRecord } from '@code-recall/shared';
import { NodeSkipped, ParseFailure, errorMessage } from './errors';
import { entitySlot } from './keys';
import { createLogger } from './log';
import { SyntaxNode, SyntaxTree, containsError, flatText, isMissingNode, lineRange, parsePython, walkTree } from './python_parser';

const log = createLogger('extractor');

export const COMPLEX_VALUE = '<complex>';
export const COMPLEX_BASE = '<complex>';

interface WalkContext {
  className?: string;
}

export interface ExtractionResult {
  entities: EntityRecord[];
  skipped: NodeSkipped[];
}

export function extract(content: string, filePath: string): EntityRecord[] {
  return extractWithDiagnostics(content, filePath).entities;
}

export function extractWithDiagnostics(content: string, filePath: string): ExtractionResult {
  if (content.includes('\u0000')) throw new ParseFailure(filePath, 'content contains NUL bytes');
  let tree: SyntaxTree;
  try {
    tree = parsePython(content);
  } catch (err) {
    throw new ParseFailure(filePath, errorMessage(err));
  }
  const root = tree.rootNode;
  if (root.type !== 'module') throw new ParseFailure(filePath, `unexpected root node ${root.type}`);

  // Later definitions of the same slot replace earlier ones.
  const bySlot = new Map<string, EntityRecord>();
  const skipped: NodeSkipped[] = [];
  const emit = (entity: EntityRecord) => {
    const slot = entitySlot(entity);
    bySlot.delete(slot);
    bySlot.set(slot, entity);
  };
  const skip = (node: SyntaxNode, reason: string) => {
    const skippedNode = new NodeSkipped(filePath, node.startPosition.row + 1, node.type, reason);
    log.warn(skippedNode.message);
    skipped.push(skippedNode);
  };

  walkTree<WalkContext>(root, {}, (node, context) => {
    try {
      switch (node.type) {
        case 'module':
        case 'decorated_definition':
          return context;
        case 'class_definition':
          return visitClass(node, context, filePath, emit, skip);
        case 'function_definition':
          visitFunction(node, context, filePath, emit, skip);
          return undefined;
        case 'expression_statement':
          visitExpressionStatement(node, context, filePath, emit);
          return undefined;
        case 'ERROR':
          skip(node, 'syntax error');
          return undefined;
        default:
          return undefined;
      }
    } catch (err) {
      skip(node, errorMessage(err));
      return undefined;
    }
  });

  return { entities: Array.from(bySlot.values()), skipped };
}

type Emit = (entity: EntityRecord) => void;
type Skip = (node: SyntaxNode, reason: string) => void;

function visitClass(node: SyntaxNode, context: WalkContext, filePath: string, emit: Emit, skip: Skip): WalkContext | undefined {
  const nameNode = node.childForFieldName('name');
  if (!nameNode || isMissingNode(nameNode)) {
    skip(node, 'class without a name');
    return undefined;
  }
  const name = nameNode.text;
  const body = node.childForFieldName('body');
  const entity: EntityRecord = {
    entity_type: 'class',
    file_path: filePath,
    name,
    ...lineRange(node),
    bases: classBases(node.childForFieldName('superclasses')),
  };
  const docstring = body ? docstringOf(body) : undefined;
  if (docstring !== undefined) entity.docstring = docstring;
  // Nested classes would share the module-level class slot; only their members are kept.
  if (!context.className) emit(entity);
  // Only the body is walked; the name and bases are not statements.
  if (body) walkBody(body, { ...context, className: name }, filePath, emit, skip);
  return undefined;
}

function walkBody(body: SyntaxNode, context: WalkContext, filePath: string, emit: Emit, skip: Skip) {
  for (const statement of body.namedChildren) {
    switch (statement.type) {
      case 'class_definition':
        visitClass(statement, context, filePath, emit, skip);
        break;
      case 'function_definition':
        visitFunction(statement, context, filePath, emit, skip);
        break;
      case 'decorated_definition': {
        const definition = statement.childForFieldName('definition');
        if (definition?.type === 'class_definition') visitClass(definition, context, filePath, emit, skip);
        else if (definition?.type === 'function_definition') visitFunction(definition, context, filePath, emit, skip);
        break;
      }
      case 'expression_statement':
        visitExpressionStatement(statement, context, filePath, emit);
        break;
      case 'ERROR':
        skip(statement, 'syntax error');
        break;
      default:
        break;
    }
  }
}

function visitFunction(node: SyntaxNode, context: WalkContext, filePath: string, emit: Emit, skip: Skip) {
  const nameNode = node.childForFieldName('name');
  const parameters = node.childForFieldName('parameters');
  if (!nameNode || isMissingNode(nameNode)) {
    skip(node, 'function without a name');
    return;
  }
  if (!parameters || containsError(parameters)) {
    skip(node, `malformed parameter list for ${nameNode.text}`);
    return;
  }
  const entity: EntityRecord = {
    entity_type: context.className ? 'method' : 'function',
    file_path: filePath,
    name: nameNode.text,
    signature: buildSignature(node, nameNode.text, parameters),
    ...lineRange(node),
  };
  const body = node.childForFieldName('body');
  const docstring = body ? docstringOf(body) : undefined;
  if (docstring !== undefined) entity.docstring = docstring;
  if (context.className) entity.parent_class = context.className;
  emit(entity);
}

function visitExpressionStatement(node: SyntaxNode, context: WalkContext, filePath: string, emit: Emit) {
  const expression = node.namedChildren[0];
  if (expression?.type !== 'assignment') return;

  // a = b = value nests assignments on the right-hand side.
  const targets: SyntaxNode[] = [];
  let current: SyntaxNode | null = expression;
  let value: SyntaxNode | null = null;
  while (current && current.type === 'assignment') {
    const left = current.childForFieldName('left');
    if (left) targets.push(left);
    value = current.childForFieldName('right');
    current = value;
  }
  // Bare annotations (`x: int`) bind nothing.
  if (!value) return;

  const valueRepr = valueRepresentation(value);
  for (const target of targets) {
    if (target.type !== 'identifier') continue;
    const entity: EntityRecord = {
      entity_type: 'variable',
      file_path: filePath,
      name: target.text,
      ...lineRange(node),
      value_repr: valueRepr,
    };
    if (context.className) entity.parent_class = context.className;
    emit(entity);
  }
}

// --- signatures -------------------------------------------------------------

export function buildSignature(fn: SyntaxNode, name: string, parameters: SyntaxNode): string {
  const isAsync = fn.children.some(child => child.type === 'async');
  const params = parameters.namedChildren.filter(p => p.type !== 'comment').map(renderParameter);
  const returnType = fn.childForFieldName('return_type');
  const suffix = returnType ? ` -> ${flatText(returnType)}` : '';
  return `${isAsync ? 'async def' : 'def'} ${name}(${params.join(', ')})${suffix}`;
}

function renderParameter(param: SyntaxNode): string {
  switch (param.type) {
    case 'identifier':
      return param.text;
    case 'typed_parameter': {
      const target = param.namedChildren[0];
      const type = param.childForFieldName('type');
      const head = target ? flatText(target) : '';
      return type ? `${head}: ${flatText(type)}` : head;
    }
    case 'default_parameter': {
      const name = param.childForFieldName('name');
      const value = param.childForFieldName('value');
      return `${name ? name.text : ''}=${value ? flatText(value) : ''}`;
    }
    case 'typed_default_parameter': {
      const name = param.childForFieldName('name');
      const type = param.childForFieldName('type');
      const value = param.childForFieldName('value');
      return `${name ? name.text : ''}: ${type ? flatText(type) : ''} = ${value ? flatText(value) : ''}`;
    }
    case 'list_splat_pattern':
    case 'dictionary_splat_pattern':
    case 'keyword_separator':
    case 'positional_separator':
      return flatText(param);
    default:
      return flatText(param);
  }
}

// --- class bases ------------------------------------------------------------

function classBases(superclasses: SyntaxNode | null): string[] {
  if (!superclasses) return [];
  const bases: string[] = [];
  for (const arg of superclasses.namedChildren) {
    if (arg.type === 'keyword_argument' || arg.type === 'comment') continue;
    bases.push(dottedName(arg) ?? COMPLEX_BASE);
  }
  return bases;
}

function dottedName(node: SyntaxNode): string | undefined {
  if (node.type === 'identifier') return node.text;
  if (node.type === 'attribute') {
    const object = node.childForFieldName('object');
    const attribute = node.childForFieldName('attribute');
    const head = object ? dottedName(object) : undefined;
    return head && attribute ? `${head}.${attribute.text}` : undefined;
  }
  return undefined;
}

// --- docstrings and literals ------------------------------------------------

function docstringOf(body: SyntaxNode): string | undefined {
  const first = body.namedChildren.find(child => child.type !== 'comment');
  if (first?.type !== 'expression_statement' || first.namedChildCount !== 1) return undefined;
  const value = stringValue(first.namedChildren[0]);
  return value === undefined ? undefined : cleanDocstring(value);
}

/** Value of a plain string literal (or an implicit concatenation of them). */
export function stringValue(node: SyntaxNode | undefined): string | undefined {
  if (!node) return undefined;
  if (node.type === 'concatenated_string') {
    const parts = node.namedChildren.map(stringValue);
    return parts.every((part): part is string => part !== undefined) ? parts.join('') : undefined;
  }
  if (node.type !== 'string') return undefined;
  return decodeStringLiteral(node.text);
}

const STRING_LITERAL = /^([rRuU]*)('''|"""|'|")([\s\S]*)\2$/;

/**
 * Decodes the text of a str literal. Byte strings and f-strings are not
 * plain str constants and decode to undefined. `\N{...}` stays verbatim:
 * resolving character names needs the Unicode name table.
 */
export function decodeStringLiteral(text: string): string | undefined {
  const match = STRING_LITERAL.exec(text);
  if (!match) return undefined;
  const [, prefix, , body] = match;
  if (/[rR]/.test(prefix)) return body;
  return body.replace(/\\(\r?\n|[\\'"abfnrtv]|[0-7]{1,3}|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8})/g, (sequence: string, escape: string) => {
    switch (escape[0]) {
      case '\n':
      case '\r':
        return '';
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'r':
        return '\r';
      case 'a':
        return '\u0007';
      case 'b':
        return '\b';
      case 'f':
        return '\f';
      case 'v':
        return '\v';
      case 'x':
      case 'u':
        return String.fromCharCode(parseInt(escape.slice(1), 16));
      case 'U': {
        const codePoint = parseInt(escape.slice(1), 16);
        return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : sequence;
      }
      default:
        return /^[0-7]/.test(escape) ? String.fromCharCode(parseInt(escape, 8)) : escape;
    }
  });
}

/** Same normalisation as Python's inspect.cleandoc. */
export function cleanDocstring(raw: string): string {
  const lines = raw.replace(/\t/g, '        ').split(/\r?\n/);
  let indent = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content) indent = Math.min(indent, line.length - content.length);
  }
  const cleaned = [lines[0].trimStart()];
  for (const line of lines.slice(1)) cleaned.push(indent === Infinity ? line : line.slice(indent));
  while (cleaned.length && !cleaned[cleaned.length - 1].trim()) cleaned.pop();
  while (cleaned.length && !cleaned[0].trim()) cleaned.shift();
  return cleaned.join('\n');
}

/** Characters repr() shows as `\xNN`: C0 and C1 controls, DEL, NBSP and the soft hyphen. */
function isHexEscaped(code: number): boolean {
  return code < 0x20 || (code >= 0x7f && code <= 0xa0) || code === 0xad;
}

export function pythonRepr(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let body = '';
  for (const char of value) {
    switch (char) {
      case '\\':
        body += '\\\\';
        break;
      case '\n':
        body += '\\n';
        break;
      case '\r':
        body += '\\r';
        break;
      case '\t':
        body += '\\t';
        break;
      case quote:
        body += `\\${quote}`;
        break;
      default: {
        const code = char.charCodeAt(0);
        body += isHexEscaped(code) ? `\\x${code.toString(16).padStart(2, '0')}` : char;
      }
    }
  }
  return `${quote}${body}${quote}`;
}

export function valueRepresentation(value: SyntaxNode): string {
  switch (value.type) {
    case 'string':
    case 'concatenated_string': {
      const decoded = stringValue(value);
      return decoded === undefined ? COMPLEX_VALUE : pythonRepr(decoded);
    }
    case 'integer':
    case 'float':
      return value.text;
    case 'true':
      return 'True';
    case 'false':
      return 'False';
    case 'none':
      return 'None';
    case 'list':
      return '[...]';
    case 'tuple':
      return '(...)';
    case 'set':
      return '{...}';
    case 'dictionary':
      return '{...: ...}';
    default:
      return COMPLEX_VALUE;
  }
}
