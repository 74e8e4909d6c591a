/**
 * Body complexity per function, scored from syntax tree shape
 */

import { calleeName, childNodes, type PyNode } from '../parser/nodes.js';
import type { ComplexityCategory, SectionCategory, SectionComplexity } from '../types/model.js';
import { COMPONENTS, FRAMEWORK_FUNCTIONS } from './components.js';

export const CATEGORY_WEIGHTS: Record<ComplexityCategory, number> = {
  advanced: 8,
  intermediate: 4,
  basic: 2,
  trivial: 1,
};

const CATEGORY_TABLE: Record<ComplexityCategory, readonly string[]> = {
  advanced: [
    'FunctionDef',
    'ClassDef',
    'lambda',
    'list_comprehension',
    'dictionary_comprehension',
    'set_comprehension',
    'generator_expression',
    'yield',
    'await',
    'try_statement',
    'except_clause',
    'except_group_clause',
    'finally_clause',
    'with_statement',
    'global_statement',
    'nonlocal_statement',
    'raise_statement',
    'assert_statement',
    'match_statement',
  ],
  intermediate: [
    'if_statement',
    'elif_clause',
    'else_clause',
    'for_statement',
    'while_statement',
    'conditional_expression',
    'boolean_operator',
    'not_operator',
    'Subscript',
    'slice',
    'list',
    'dictionary',
    'set',
    'Tuple',
    'break_statement',
    'continue_statement',
  ],
  basic: [
    'assignment',
    'augmented_assignment',
    'AnnAssign',
    'Call',
    'Return',
    'comparison_operator',
    'binary_operator',
    'unary_operator',
    'Attribute',
    'keyword_argument',
  ],
  trivial: ['Name', 'Constant', 'pass_statement', 'expression_statement'],
};

const CATEGORIES: readonly ComplexityCategory[] = ['advanced', 'intermediate', 'basic', 'trivial'];

const CATEGORY_BY_KIND = new Map<string, ComplexityCategory>();
for (const category of CATEGORIES) {
  for (const kind of CATEGORY_TABLE[category]) {
    CATEGORY_BY_KIND.set(kind, category);
  }
}

function nodeKind(node: PyNode): string {
  return node.kind === 'Other' ? node.type : node.kind;
}

export function categorize(node: PyNode, frameworkNames: ReadonlySet<string>): SectionCategory | null {
  if (node.kind === 'Call') {
    const name = calleeName(node);
    if (name !== null && frameworkNames.has(name)) return 'drafter';
  }
  return CATEGORY_BY_KIND.get(nodeKind(node)) ?? null;
}

function emptyCounts(): Record<SectionCategory, number> {
  return { advanced: 0, intermediate: 0, basic: 0, trivial: 0, drafter: 0 };
}

function countBody(
  nodes: PyNode[],
  counts: Record<SectionCategory, number>,
  frameworkNames: ReadonlySet<string>
): void {
  for (const node of nodes) {
    const category = categorize(node, frameworkNames);
    if (category) counts[category]++;
    // nested definitions are scored as sections of their own
    if (node.kind === 'FunctionDef' || node.kind === 'ClassDef') continue;
    countBody(childNodes(node), counts, frameworkNames);
  }
}

/**
 * One section per function definition at any depth. Methods and nested
 * functions are named by their enclosing definitions, e.g. `State.reset`.
 */
export function scoreSections(
  root: PyNode,
  components: readonly string[] = COMPONENTS
): SectionComplexity[] {
  const frameworkNames = new Set([...components, ...FRAMEWORK_FUNCTIONS]);
  const sections: SectionComplexity[] = [];

  const walk = (node: PyNode, prefix: string): void => {
    if (node.kind === 'FunctionDef') {
      const name = `${prefix}${node.name}`;
      const counts = emptyCounts();
      countBody(node.body, counts, frameworkNames);
      sections.push({
        name,
        startLine: node.startLine,
        endLine: node.endLine,
        counts,
        total: weightedTotal(counts),
      });
      for (const statement of node.body) walk(statement, `${name}.`);
      return;
    }
    if (node.kind === 'ClassDef') {
      for (const statement of node.body) walk(statement, `${prefix}${node.name}.`);
      return;
    }
    for (const child of childNodes(node)) walk(child, prefix);
  };

  walk(root, '');
  return sections;
}

function weightedTotal(counts: Record<SectionCategory, number>): number {
  return CATEGORIES.reduce((sum, category) => sum + counts[category] * CATEGORY_WEIGHTS[category], 0);
}
