/**
 * Syntax checks on the concrete tree.
 *
 * The tree-sitter grammar is error tolerant: besides ERROR and missing
 * nodes it quietly accepts Python 2 statements, misordered call arguments,
 * malformed parameter lists and indentation that lines up with no block.
 * Each of those is reported here the way Python's own parser reports it.
 */

import { isMissing, namedChildren, type TreeSitterNode } from './syntax-tree.js';

export interface SyntaxProblem {
  message: string;
  /** 0-based, as tree-sitter counts */
  row: number;
  column: number;
}

interface Indent {
  /** Tabs advance to the next multiple of 8 */
  width: number;
  /** Tabs count as a single column */
  altWidth: number;
}

type ParameterKind = 'plain' | 'default' | 'star' | 'other';

const CLAUSES = new Set([
  'elif_clause',
  'else_clause',
  'except_clause',
  'except_group_clause',
  'finally_clause',
]);

export function findSyntaxProblem(root: TreeSitterNode, source: string): SyntaxProblem | null {
  return (
    findInvalidNode(root) ??
    findInvalidConstruct(root) ??
    new IndentationChecker(source.split('\n')).check(root)
  );
}

function problemAt(node: TreeSitterNode, message: string): SyntaxProblem {
  return { message, row: node.startPosition.row, column: node.startPosition.column };
}

function findInvalidNode(node: TreeSitterNode): SyntaxProblem | null {
  if (isMissing(node)) return problemAt(node, `Missing ${node.type}`);
  if (node.type === 'ERROR') return problemAt(node, `Invalid syntax near '${firstLine(node.text)}'`);

  for (const child of node.children) {
    const found = findInvalidNode(child);
    if (found) return found;
  }
  return null;
}

function firstLine(text: string): string {
  const line = text.split('\n')[0] ?? '';
  return line.length > 40 ? `${line.slice(0, 40)}...` : line;
}

function findInvalidConstruct(node: TreeSitterNode): SyntaxProblem | null {
  const problem = checkConstruct(node);
  if (problem) return problem;

  for (const child of node.namedChildren) {
    const found = findInvalidConstruct(child);
    if (found) return found;
  }
  return null;
}

function checkConstruct(node: TreeSitterNode): SyntaxProblem | null {
  switch (node.type) {
    case 'print_statement':
      return isCallShaped(node) ? null : problemAt(node, "Missing parentheses in call to 'print'");
    case 'exec_statement':
      return problemAt(node, "Missing parentheses in call to 'exec'");
    case 'argument_list':
      return checkArguments(node);
    case 'parameters':
    case 'lambda_parameters':
      return checkParameters(node);
    default:
      return null;
  }
}

// `print (a, b)` is still a call in Python 3
function isCallShaped(statement: TreeSitterNode): boolean {
  const args = namedChildren(statement);
  const only = args.length === 1 ? args[0] : undefined;
  return (
    only !== undefined &&
    (only.type === 'parenthesized_expression' || only.type === 'tuple') &&
    only.text.startsWith('(')
  );
}

function checkArguments(list: TreeSitterNode): SyntaxProblem | null {
  const keywords = new Set<string>();
  let afterKeyword = false;
  let afterKeywordUnpacking = false;

  for (const arg of namedChildren(list)) {
    switch (arg.type) {
      case 'keyword_argument': {
        const name = arg.childForFieldName('name')?.text;
        if (name !== undefined) {
          if (keywords.has(name)) return problemAt(arg, `keyword argument repeated: ${name}`);
          keywords.add(name);
        }
        afterKeyword = true;
        break;
      }
      case 'dictionary_splat':
        afterKeywordUnpacking = true;
        break;
      case 'list_splat':
        if (afterKeywordUnpacking) {
          return problemAt(arg, 'iterable argument unpacking follows keyword argument unpacking');
        }
        break;
      default:
        if (afterKeywordUnpacking) {
          return problemAt(arg, 'positional argument follows keyword argument unpacking');
        }
        if (afterKeyword) {
          return problemAt(arg, 'positional argument follows keyword argument');
        }
    }
  }

  return null;
}

function parameterKind(param: TreeSitterNode): ParameterKind {
  switch (param.type) {
    case 'identifier':
      return 'plain';
    case 'default_parameter':
    case 'typed_default_parameter':
      return 'default';
    case 'keyword_separator':
    case 'list_splat_pattern':
      return 'star';
    case 'typed_parameter': {
      const inner = param.namedChildren[0];
      if (inner?.type === 'identifier') return 'plain';
      if (inner?.type === 'list_splat_pattern') return 'star';
      return 'other';
    }
    default:
      return 'other';
  }
}

function checkParameters(parameters: TreeSitterNode): SyntaxProblem | null {
  let keywordOnly = false;
  let seenDefault = false;
  // a bare `*` still waiting for a named parameter
  let bareStar: TreeSitterNode | null = null;

  for (const param of namedChildren(parameters)) {
    switch (parameterKind(param)) {
      case 'star':
        keywordOnly = true;
        if (param.type === 'keyword_separator') bareStar = param;
        break;
      case 'plain':
        if (seenDefault && !keywordOnly) {
          return problemAt(param, 'non-default argument follows default argument');
        }
        bareStar = null;
        break;
      case 'default':
        seenDefault = true;
        bareStar = null;
        break;
      case 'other':
        break;
    }
  }

  return bareStar ? problemAt(bareStar, 'named arguments must follow bare *') : null;
}

/**
 * Statements of one block share an indentation, measured with tabs both as
 * 8 columns and as 1; clauses and decorated definitions line up with the
 * statement they belong to.
 */
class IndentationChecker {
  // the most recent statement that started a line
  private last: Indent = { width: 0, altWidth: 0 };

  constructor(private readonly lines: string[]) {}

  check(module: TreeSitterNode): SyntaxProblem | null {
    return this.checkStatements(module, { width: 0, altWidth: 0 });
  }

  private checkStatements(block: TreeSitterNode, own: Indent | null): SyntaxProblem | null {
    let expected = own;

    for (const statement of namedChildren(block)) {
      const indent = this.lineIndent(statement);
      if (indent) {
        const problem = expected ? this.compare(statement, indent, expected) : null;
        if (problem) return problem;
        expected = indent;
        this.last = indent;
      }

      const nested = this.checkNested(statement, expected);
      if (nested) return nested;
    }

    return null;
  }

  private checkBlock(block: TreeSitterNode, enclosing: Indent | null): SyntaxProblem | null {
    const first = namedChildren(block).find(statement => this.lineIndent(statement) !== null);
    const indent = first ? this.lineIndent(first) : null;

    if (first && indent && enclosing) {
      if (indent.width <= enclosing.width) {
        return problemAt(first, 'expected an indented block');
      }
      if (indent.altWidth <= enclosing.altWidth) {
        return problemAt(first, 'inconsistent use of tabs and spaces in indentation');
      }
    }

    return this.checkStatements(block, indent ?? enclosing);
  }

  private checkNested(node: TreeSitterNode, enclosing: Indent | null): SyntaxProblem | null {
    for (const child of namedChildren(node)) {
      if (child.type === 'block') {
        const problem = this.checkBlock(child, enclosing);
        if (problem) return problem;
        continue;
      }

      if (CLAUSES.has(child.type) || node.type === 'decorated_definition') {
        const indent = this.lineIndent(child);
        if (indent) {
          const problem = enclosing ? this.compare(child, indent, enclosing) : null;
          if (problem) return problem;
          this.last = indent;
        }
      }

      const problem = this.checkNested(child, enclosing);
      if (problem) return problem;
    }

    return null;
  }

  private compare(node: TreeSitterNode, indent: Indent, expected: Indent): SyntaxProblem | null {
    if (indent.width === expected.width) {
      return indent.altWidth === expected.altWidth
        ? null
        : problemAt(node, 'inconsistent use of tabs and spaces in indentation');
    }
    if (indent.width < expected.width || this.last.width > indent.width) {
      return problemAt(node, 'unindent does not match any outer indentation level');
    }
    return problemAt(node, 'unexpected indent');
  }

  /**
   * Indentation of the line the node starts, or null when something else
   * precedes the node on that line.
   */
  private lineIndent(node: TreeSitterNode): Indent | null {
    const line = this.lines[node.startPosition.row] ?? '';
    const leading = /^[ \t\f]*/.exec(line)?.[0] ?? '';
    if (leading.length !== node.startPosition.column) return null;

    let width = 0;
    let altWidth = 0;
    for (const char of leading) {
      if (char === ' ') {
        width++;
        altWidth++;
      } else if (char === '\t') {
        width = (Math.floor(width / 8) + 1) * 8;
        altWidth++;
      } else {
        // form feed
        width = 0;
        altWidth = 0;
      }
    }
    return { width, altWidth };
  }
}
