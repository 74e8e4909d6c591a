/**
 * Python syntax tree provider using tree-sitter
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

import { PythonSyntaxError } from './errors.js';
import { namedChildren, type TreeSitterNode } from './syntax-tree.js';
import { findSyntaxProblem } from './validation.js';
import type {
  ExpressionContext,
  FunctionDefNode,
  ClassDefNode,
  ModuleNode,
  PyNode,
  Span,
} from './nodes.js';

// node-tree-sitter 0.21 rejects string input of 32 KiB or more, so larger
// files are fed through the callback form in chunks
const CHUNK_SIZE = 16 * 1024;

const STRING_LITERAL = /^([rRuU]?)('''|"""|'|")([\s\S]*)\2$/;

export class PythonParser {
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Python);
  }

  /**
   * Parse source text into a module node.
   *
   * @throws PythonSyntaxError when the text is not valid Python
   */
  parse(source: string): ModuleNode {
    const tree = this.parser.parse((index: number) => source.slice(index, index + CHUNK_SIZE));
    const root = tree.rootNode as unknown as TreeSitterNode;

    const problem = findSyntaxProblem(root, source);
    if (problem) {
      throw new PythonSyntaxError(problem.message, problem.row + 1, problem.column + 1);
    }

    return {
      kind: 'Module',
      body: convertStatements(root),
      ...spanOf(root),
    };
  }
}

function spanOf(node: TreeSitterNode): Span {
  return {
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

function convertStatements(block: TreeSitterNode): PyNode[] {
  return namedChildren(block).map(stmt => convert(stmt));
}

function convertAll(nodes: TreeSitterNode[], ctx: ExpressionContext = 'load'): PyNode[] {
  return nodes.filter(n => n.type !== 'comment').map(n => convert(n, ctx));
}

function other(node: TreeSitterNode, children: PyNode[]): PyNode {
  return { kind: 'Other', type: node.type, text: node.text, children, ...spanOf(node) };
}

function convert(node: TreeSitterNode, ctx: ExpressionContext = 'load'): PyNode {
  switch (node.type) {
    case 'identifier':
      return { kind: 'Name', id: node.text, ...spanOf(node) };

    case 'integer':
    case 'float':
      return { kind: 'Constant', value: Number(node.text.replaceAll('_', '')), text: node.text, ...spanOf(node) };
    case 'true':
    case 'false':
      return { kind: 'Constant', value: node.type === 'true', text: node.text, ...spanOf(node) };
    case 'none':
      return { kind: 'Constant', value: null, text: node.text, ...spanOf(node) };
    case 'string':
      return convertString(node);
    case 'concatenated_string':
      return convertConcatenatedString(node);

    case 'attribute':
      return convertAttribute(node, ctx);
    case 'subscript':
      return convertSubscript(node);
    case 'call':
      return convertCall(node);

    case 'tuple':
    case 'expression_list':
    case 'pattern_list':
    case 'tuple_pattern':
      return {
        kind: 'Tuple',
        elts: convertAll(namedChildren(node), ctx),
        text: node.text,
        ...spanOf(node),
      };

    case 'parenthesized_expression': {
      const inner = namedChildren(node);
      return inner.length === 1 && inner[0] ? convert(inner[0], ctx) : other(node, convertAll(inner, ctx));
    }

    case 'type':
      return convertType(node);
    case 'generic_type':
      return convertGenericType(node);
    case 'member_type':
      return convertMemberType(node);

    case 'expression_statement': {
      const inner = namedChildren(node);
      const only = inner.length === 1 ? inner[0] : undefined;
      if (only && (only.type === 'assignment' || only.type === 'augmented_assignment')) {
        return convert(only);
      }
      return other(node, convertAll(inner));
    }
    case 'assignment':
      return convertAssignment(node);
    case 'augmented_assignment': {
      const left = node.childForFieldName('left');
      const right = node.childForFieldName('right');
      return other(node, [
        ...(left ? [convert(left, 'store')] : []),
        ...(right ? [convert(right)] : []),
      ]);
    }
    case 'delete_statement':
      return other(node, convertAll(namedChildren(node), 'del'));
    case 'return_statement': {
      const value = namedChildren(node)[0];
      return { kind: 'Return', value: value ? convert(value) : null, ...spanOf(node) };
    }

    case 'keyword_argument': {
      // the keyword name is not an expression
      const value = node.childForFieldName('value');
      return other(node, value ? [convert(value)] : []);
    }

    case 'decorated_definition':
      return convertDecoratedDefinition(node);
    case 'class_definition':
      return convertClassDefinition(node, []);
    case 'function_definition':
    case 'async_function_definition':
      return convertFunctionDefinition(node, []);

    default:
      return other(node, convertAll(namedChildren(node)));
  }
}

function convertString(node: TreeSitterNode): PyNode {
  const hasInterpolation = node.namedChildren.some(c => c.type === 'interpolation');
  const match = STRING_LITERAL.exec(node.text);
  if (hasInterpolation || !match) {
    return other(node, convertAll(namedChildren(node)));
  }
  return { kind: 'Constant', value: match[3] ?? '', text: node.text, ...spanOf(node) };
}

function convertConcatenatedString(node: TreeSitterNode): PyNode {
  const parts = namedChildren(node).map(convertString);
  const values: string[] = [];
  for (const part of parts) {
    if (part.kind !== 'Constant' || typeof part.value !== 'string') {
      return other(node, parts);
    }
    values.push(part.value);
  }
  return { kind: 'Constant', value: values.join(''), text: node.text, ...spanOf(node) };
}

function convertAttribute(node: TreeSitterNode, ctx: ExpressionContext): PyNode {
  const object = node.childForFieldName('object');
  const attribute = node.childForFieldName('attribute');
  if (!object || !attribute) {
    return other(node, convertAll(namedChildren(node)));
  }
  return {
    kind: 'Attribute',
    value: convert(object),
    attr: attribute.text,
    ctx,
    ...spanOf(node),
  };
}

function convertSubscript(node: TreeSitterNode): PyNode {
  const value = node.childForFieldName('value');
  const indices = node.childrenForFieldName('subscript').filter(c => c.type !== 'comment');
  if (!value || indices.length === 0) {
    return other(node, convertAll(namedChildren(node)));
  }
  return {
    kind: 'Subscript',
    value: convert(value),
    slice: sliceOf(node, indices),
    ...spanOf(node),
  };
}

/**
 * `Base[a, b]` carries a tuple slice, whichever way the grammar spelled it.
 */
function sliceOf(owner: TreeSitterNode, indices: TreeSitterNode[]): PyNode {
  const only = indices.length === 1 ? indices[0] : undefined;
  if (only) return convert(only);

  const first = indices[0];
  const last = indices[indices.length - 1];
  return {
    kind: 'Tuple',
    elts: indices.map(i => convert(i)),
    text: indices.map(i => i.text).join(', '),
    startLine: (first ?? owner).startPosition.row + 1,
    endLine: (last ?? owner).endPosition.row + 1,
  };
}

function convertType(node: TreeSitterNode): PyNode {
  const inner = namedChildren(node);
  const only = inner.length === 1 ? inner[0] : undefined;
  return only ? convert(only) : other(node, convertAll(inner));
}

function convertGenericType(node: TreeSitterNode): PyNode {
  const inner = namedChildren(node);
  const base = inner[0];
  const parameters = inner.find(c => c.type === 'type_parameter');
  if (!base || !parameters) {
    return other(node, convertAll(inner));
  }
  const indices = namedChildren(parameters);
  if (indices.length === 0) {
    return convert(base);
  }
  return {
    kind: 'Subscript',
    value: convert(base),
    slice: sliceOf(parameters, indices),
    ...spanOf(node),
  };
}

function convertMemberType(node: TreeSitterNode): PyNode {
  const inner = namedChildren(node);
  const qualifier = inner[0];
  const member = inner[inner.length - 1];
  if (inner.length !== 2 || !qualifier || !member || member.type !== 'identifier') {
    return other(node, convertAll(inner));
  }
  return {
    kind: 'Attribute',
    value: convert(qualifier),
    attr: member.text,
    ctx: 'load',
    ...spanOf(node),
  };
}

function convertAssignment(node: TreeSitterNode): PyNode {
  const left = node.childForFieldName('left');
  const type = node.childForFieldName('type');
  const right = node.childForFieldName('right');

  if (left && type) {
    return {
      kind: 'AnnAssign',
      target: convert(left, 'store'),
      annotation: convert(type),
      value: right ? convert(right) : null,
      ...spanOf(node),
    };
  }

  return other(node, [
    ...(left ? [convert(left, 'store')] : []),
    ...(right ? [convert(right)] : []),
  ]);
}

function convertCall(node: TreeSitterNode): PyNode {
  const func = node.childForFieldName('function');
  const argumentsNode = node.childForFieldName('arguments');
  if (!func) {
    return other(node, convertAll(namedChildren(node)));
  }

  const args: PyNode[] = [];
  const keywords: PyNode[] = [];

  if (argumentsNode?.type === 'generator_expression') {
    args.push(convert(argumentsNode));
  } else if (argumentsNode) {
    for (const arg of namedChildren(argumentsNode)) {
      if (arg.type === 'keyword_argument' || arg.type === 'dictionary_splat') {
        keywords.push(convert(arg));
      } else {
        args.push(convert(arg));
      }
    }
  }

  return { kind: 'Call', func: convert(func), args, keywords, text: node.text, ...spanOf(node) };
}

function convertDecoratedDefinition(node: TreeSitterNode): PyNode {
  const decorators = namedChildren(node)
    .filter(c => c.type === 'decorator')
    .flatMap(d => namedChildren(d).map(expr => convert(expr)));
  const definition = node.childForFieldName('definition');

  if (definition?.type === 'class_definition') {
    return convertClassDefinition(definition, decorators);
  }
  if (definition?.type === 'function_definition' || definition?.type === 'async_function_definition') {
    return convertFunctionDefinition(definition, decorators);
  }
  return other(node, convertAll(namedChildren(node)));
}

function convertClassDefinition(node: TreeSitterNode, decorators: PyNode[]): ClassDefNode {
  const nameNode = node.childForFieldName('name');
  const superclasses = node.childForFieldName('superclasses');
  const body = node.childForFieldName('body');

  const bases: PyNode[] = [];
  const keywords: PyNode[] = [];
  for (const arg of superclasses ? namedChildren(superclasses) : []) {
    if (arg.type === 'keyword_argument' || arg.type === 'dictionary_splat') {
      keywords.push(convert(arg));
    } else {
      bases.push(convert(arg));
    }
  }

  return {
    kind: 'ClassDef',
    name: nameNode?.text ?? '',
    decorators,
    bases,
    keywords,
    body: body ? convertStatements(body) : [],
    ...spanOf(node),
  };
}

function convertFunctionDefinition(node: TreeSitterNode, decorators: PyNode[]): FunctionDefNode {
  const nameNode = node.childForFieldName('name');
  const parameters = node.childForFieldName('parameters');
  const returnType = node.childForFieldName('return_type');
  const body = node.childForFieldName('body');

  const { params, paramNodes } = parameters ? convertParameters(parameters) : { params: [], paramNodes: [] };

  return {
    kind: 'FunctionDef',
    name: nameNode?.text ?? '',
    isAsync: node.type === 'async_function_definition' || node.children.some(c => c.type === 'async'),
    decorators,
    params,
    paramNodes,
    returns: returnType ? convert(returnType) : null,
    body: body ? convertStatements(body) : [],
    ...spanOf(node),
  };
}

/**
 * Collects the plain positional parameters: names declared before `/` are
 * positional-only and dropped, and collection stops at `*` or `*args`.
 */
function convertParameters(parameters: TreeSitterNode): { params: string[]; paramNodes: PyNode[] } {
  let params: string[] = [];
  const paramNodes: PyNode[] = [];
  let positional = true;

  for (const param of namedChildren(parameters)) {
    const typeNode = param.childForFieldName('type');
    const valueNode = param.childForFieldName('value');
    if (typeNode) paramNodes.push(convert(typeNode));
    if (valueNode) paramNodes.push(convert(valueNode));

    switch (param.type) {
      case 'identifier':
        if (positional) params.push(param.text);
        break;
      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = param.childForFieldName('name');
        if (positional && name) params.push(name.text);
        break;
      }
      case 'typed_parameter': {
        const name = param.namedChildren[0];
        if (name?.type === 'identifier') {
          if (positional) params.push(name.text);
        } else if (name?.type === 'list_splat_pattern') {
          positional = false;
        }
        break;
      }
      case 'positional_separator':
        params = [];
        break;
      case 'keyword_separator':
      case 'list_splat_pattern':
        positional = false;
        break;
    }
  }

  return { params, paramNodes };
}
