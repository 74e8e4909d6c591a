/**
 * Parser exports
 */

import { PythonParser } from './python.js';
import type { ModuleNode } from './nodes.js';

export { PythonParser } from './python.js';
export { PythonSyntaxError } from './errors.js';
export * from './nodes.js';

// Singleton parser instance
let defaultParser: PythonParser | null = null;

export function getDefaultParser(): PythonParser {
  if (!defaultParser) {
    defaultParser = new PythonParser();
  }
  return defaultParser;
}

export function resetParser(): void {
  defaultParser = null;
}

/**
 * Parse Python source with the shared parser
 */
export function parsePython(source: string): ModuleNode {
  return getDefaultParser().parse(source);
}
