/**
 * Renders annotation nodes as readable type names, e.g. `list[Item]`.
 */

import type { PyNode } from '../parser/nodes.js';

export function renderTypeName(node: PyNode): string {
  switch (node.kind) {
    case 'Name':
      return node.id;
    case 'Constant':
      return renderConstant(node.value, node.text);
    case 'Attribute':
      return `${renderTypeName(node.value)}.${node.attr}`;
    case 'Subscript': {
      const base = renderTypeName(node.value);
      if (node.slice.kind === 'Name') {
        return `${base}[${node.slice.id}]`;
      }
      if (node.slice.kind === 'Tuple') {
        return `${base}[${node.slice.elts.map(renderTypeName).join(', ')}]`;
      }
      return base;
    }
    case 'Tuple':
    case 'Call':
    case 'Other':
      return node.text;
    default:
      return node.kind;
  }
}

function renderConstant(value: string | number | boolean | null, text: string): string {
  if (value === null) return 'None';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'string') return value;
  return text;
}

/**
 * Portion of a rendered type before the first `[`.
 */
export function baseTypeName(rendered: string): string {
  const bracket = rendered.indexOf('[');
  return bracket === -1 ? rendered : rendered.slice(0, bracket);
}

/**
 * Interior of the outermost brackets split on top-level commas, or null
 * when the rendered type has no subscript.
 */
export function typeArguments(rendered: string): string[] | null {
  const open = rendered.indexOf('[');
  const close = rendered.lastIndexOf(']');
  if (open === -1 || close <= open) return null;

  const interior = rendered.slice(open + 1, close);
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const ch of interior) {
    if (ch === '[') depth++;
    else if (ch === ']') depth--;

    if (ch === ',' && depth === 0) {
      parts.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current.trim());

  return parts.filter(p => p.length > 0);
}
