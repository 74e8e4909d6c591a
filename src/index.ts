/**
 * drafter-lens - static analysis for Drafter websites
 *
 * Extracts dataclasses, routes, component usage, composition and call
 * graphs from a single Python source file, and renders them as text,
 * CSV, HTML, Mermaid and JSON reports.
 */

// Types
export * from './types/index.js';

// Parser
export {
  PythonParser,
  PythonSyntaxError,
  parsePython,
  getDefaultParser,
  resetParser,
  childNodes,
  calleeName,
  type PyNode,
  type PyNodeKind,
  type ModuleNode,
} from './parser/index.js';

// Analyzer
export {
  analyze,
  AnalysisModel,
  traverse,
  resolveDependencies,
  renderTypeName,
  scoreFieldType,
  scoreSections,
  COMPONENTS,
  NAVIGATION_COMPONENTS,
  type TraversalResult,
} from './analyzer/index.js';

// Reports
export {
  renderReportFiles,
  generateTextReport,
  generateClassDiagram,
  generateFunctionDiagram,
  generateRecordsCsv,
  generateRoutesCsv,
  generateHtml,
  generateJson,
  buildReport,
  REPORT_FORMATS,
  type ReportFormat,
  type ReportFile,
  type AnalysisReport,
} from './reports/index.js';

// Runner
export { ReportRunner, type RunnerConfig, type RunResult, type FileReport } from './runner/index.js';
export { Watcher, type WatcherOptions } from './runner/watcher.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  toAnalyzeOptions,
  type Config,
} from './config/index.js';
