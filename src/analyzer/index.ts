/**
 * Analysis engine entry point
 */

import { parsePython } from '../parser/index.js';
import type { AnalyzeOptions } from '../types/model.js';
import { AnalysisModel } from './model.js';
import { traverse } from './visitor.js';

/**
 * Parse Python source and build its model.
 *
 * @throws PythonSyntaxError when the source does not parse; nothing partial is returned
 */
export function analyze(source: string, options: AnalyzeOptions = {}): AnalysisModel {
  const module = parsePython(source);
  const traversal = traverse(module, options);
  return new AnalysisModel(traversal, module, options.components);
}

export { AnalysisModel } from './model.js';
export { traverse, type TraversalResult } from './visitor.js';
export { resolveDependencies } from './dependencies.js';
export { renderTypeName, baseTypeName, typeArguments } from './type-names.js';
export { scoreFieldType, scoreRecord, FIELD_SCORES } from './complexity.js';
export { scoreSections, categorize, CATEGORY_WEIGHTS } from './sections.js';
export { buildAttributeUsage, findUnusedRecords, findUnusedFields } from './usage.js';
export {
  COMPONENTS,
  NAVIGATION_COMPONENTS,
  RECORD_MARKERS,
  ROUTE_MARKERS,
  FRAMEWORK_FUNCTIONS,
} from './components.js';
