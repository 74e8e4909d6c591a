/**
 * Closed set of Python syntax node shapes the analyzer dispatches on.
 *
 * Anything the analysis does not need to inspect structurally becomes an
 * `Other` node that still carries its children, so every nested call and
 * attribute access stays reachable from a generic walk.
 */

export interface Span {
  startLine: number;
  endLine: number;
}

export type ExpressionContext = 'load' | 'store' | 'del';

export interface ModuleNode extends Span {
  kind: 'Module';
  body: PyNode[];
}

export interface ClassDefNode extends Span {
  kind: 'ClassDef';
  name: string;
  decorators: PyNode[];
  bases: PyNode[];
  keywords: PyNode[];
  body: PyNode[];
}

export interface FunctionDefNode extends Span {
  kind: 'FunctionDef';
  name: string;
  isAsync: boolean;
  decorators: PyNode[];
  /** Plain positional parameter names, in declaration order */
  params: string[];
  /** Default values and annotations of every parameter */
  paramNodes: PyNode[];
  returns: PyNode | null;
  body: PyNode[];
}

export interface AnnAssignNode extends Span {
  kind: 'AnnAssign';
  target: PyNode;
  annotation: PyNode;
  value: PyNode | null;
}

export interface ReturnNode extends Span {
  kind: 'Return';
  value: PyNode | null;
}

export interface CallNode extends Span {
  kind: 'Call';
  func: PyNode;
  args: PyNode[];
  keywords: PyNode[];
  text: string;
}

export interface AttributeNode extends Span {
  kind: 'Attribute';
  value: PyNode;
  attr: string;
  ctx: ExpressionContext;
}

export interface NameNode extends Span {
  kind: 'Name';
  id: string;
}

export interface ConstantNode extends Span {
  kind: 'Constant';
  value: string | number | boolean | null;
  text: string;
}

export interface SubscriptNode extends Span {
  kind: 'Subscript';
  value: PyNode;
  slice: PyNode;
}

export interface TupleNode extends Span {
  kind: 'Tuple';
  elts: PyNode[];
  text: string;
}

export interface OtherNode extends Span {
  kind: 'Other';
  /** Grammar node type, e.g. `if_statement` */
  type: string;
  text: string;
  children: PyNode[];
}

export type PyNode =
  | ModuleNode
  | ClassDefNode
  | FunctionDefNode
  | AnnAssignNode
  | ReturnNode
  | CallNode
  | AttributeNode
  | NameNode
  | ConstantNode
  | SubscriptNode
  | TupleNode
  | OtherNode;

export type PyNodeKind = PyNode['kind'];

/**
 * Child nodes in the order a generic visit reaches them.
 */
export function childNodes(node: PyNode): PyNode[] {
  switch (node.kind) {
    case 'Module':
      return node.body;
    case 'ClassDef':
      return [...node.bases, ...node.keywords, ...node.body, ...node.decorators];
    case 'FunctionDef':
      return [
        ...node.paramNodes,
        ...node.body,
        ...node.decorators,
        ...(node.returns ? [node.returns] : []),
      ];
    case 'AnnAssign':
      return node.value
        ? [node.target, node.annotation, node.value]
        : [node.target, node.annotation];
    case 'Return':
      return node.value ? [node.value] : [];
    case 'Call':
      return [node.func, ...node.args, ...node.keywords];
    case 'Attribute':
      return [node.value];
    case 'Subscript':
      return [node.value, node.slice];
    case 'Tuple':
      return node.elts;
    case 'Other':
      return node.children;
    case 'Name':
    case 'Constant':
      return [];
  }
}

/**
 * Simple name of the callee: the bare name, or the attribute of a
 * qualified call (`obj.method()` resolves to `method`).
 */
export function calleeName(call: CallNode): string | null {
  if (call.func.kind === 'Name') return call.func.id;
  if (call.func.kind === 'Attribute') return call.func.attr;
  return null;
}
