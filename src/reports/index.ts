/**
 * Report exports
 */

import type { AnalysisModel } from '../analyzer/model.js';
import { generateRecordsCsv, generateRoutesCsv } from './csv.js';
import { generateHtml } from './html.js';
import { generateJson } from './json.js';
import { generateClassDiagram, generateFunctionDiagram } from './mermaid.js';
import {
  generateComplexityReport,
  generateRecordSummary,
  generateRouteSummary,
  generateSectionTable,
  generateUnusedReport,
} from './text.js';

export const REPORT_FORMATS = ['text', 'csv', 'html', 'mermaid', 'json'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface ReportFile {
  fileName: string;
  content: string;
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(format => format === value);
}

/**
 * Files for each requested format, in format order
 */
export function renderReportFiles(
  model: AnalysisModel,
  formats: readonly ReportFormat[],
  title?: string
): ReportFile[] {
  const files: ReportFile[] = [];

  for (const format of formats) {
    switch (format) {
      case 'text':
        files.push({ fileName: 'dataclasses.txt', content: generateRecordSummary(model) });
        files.push({ fileName: 'routes.txt', content: generateRouteSummary(model) });
        break;
      case 'csv':
        files.push({ fileName: 'records.csv', content: generateRecordsCsv(model) });
        files.push({ fileName: 'routes.csv', content: generateRoutesCsv(model) });
        break;
      case 'html':
        files.push({ fileName: 'report.html', content: generateHtml(model, title) });
        break;
      case 'mermaid':
        files.push({ fileName: 'class_diagram.mmd', content: generateClassDiagram(model) });
        files.push({ fileName: 'function_diagram.mmd', content: generateFunctionDiagram(model) });
        break;
      case 'json':
        files.push({ fileName: 'analysis.json', content: generateJson(model) });
        break;
    }
  }

  return files;
}

/**
 * Every text report, separated by blank lines
 */
export function generateTextReport(model: AnalysisModel): string {
  return [
    generateRecordSummary(model),
    generateRouteSummary(model),
    generateClassDiagram(model),
    generateFunctionDiagram(model),
    generateComplexityReport(model),
    generateUnusedReport(model),
    generateSectionTable(model),
  ].join('\n');
}

export { generateClassDiagram, generateFunctionDiagram } from './mermaid.js';
export {
  generateRecordSummary,
  generateRouteSummary,
  generateComplexityReport,
  generateUnusedReport,
  generateSectionTable,
  formatScore,
} from './text.js';
export { generateRecordsCsv, generateRoutesCsv, escapeCsv } from './csv.js';
export { generateHtml, escapeHtml } from './html.js';
export { generateJson, buildReport, type AnalysisReport } from './json.js';
export { formatTable, type TableRecord, type TableField } from './table.js';
