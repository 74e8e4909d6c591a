/**
 * The slice of the tree-sitter node API the Python adapter reads
 */

export interface TreeSitterNode {
  type: string;
  text: string;
  startPosition: { row: number; column: number };
  endPosition: { row: number; column: number };
  children: TreeSitterNode[];
  childForFieldName(name: string): TreeSitterNode | null;
  childrenForFieldName(name: string): TreeSitterNode[];
  namedChildren: TreeSitterNode[];
  parent: TreeSitterNode | null;
  // A property in newer bindings, a method in older ones
  isMissing: boolean | (() => boolean);
}

export function isMissing(node: TreeSitterNode): boolean {
  return typeof node.isMissing === 'function' ? node.isMissing() : node.isMissing;
}

export function namedChildren(node: TreeSitterNode): TreeSitterNode[] {
  return node.namedChildren.filter(c => c.type !== 'comment');
}
