/**
 * Plain-text reports for console output
 */

import type { AnalysisModel } from '../analyzer/model.js';
import { formatTable } from './table.js';

export function formatScore(score: number): string {
  return score.toFixed(1);
}

export function generateRecordSummary(model: AnalysisModel): string {
  let text = 'Dataclasses:\n';
  for (const record of model.getRecords()) {
    text += `${record.name}\n`;
    for (const field of record.fields) {
      text += `  ${field.name}\n`;
    }
  }
  return text;
}

export function generateRouteSummary(model: AnalysisModel): string {
  let text = 'Routes:\n';
  for (const route of model.getRoutes()) {
    text += `${route.signature}\n`;
    for (const [component, count] of Object.entries(route.componentUsage)) {
      text += `  ${component}: ${count}\n`;
    }
    for (const field of route.fieldsUsed) {
      text += `  ${field} used\n`;
    }
    for (const call of route.calledNames) {
      text += `  calls ${call}\n`;
    }
  }
  return text;
}

export function generateComplexityReport(model: AnalysisModel): string {
  let text = 'Record Complexity:\n';
  for (const record of model.getComplexity()) {
    text += `${record.record}\n`;
    for (const field of record.fields) {
      text += `  ${field.field}: ${field.type} = ${formatScore(field.score)}\n`;
    }
    text += `  Total: ${formatScore(record.total)}\n`;
  }
  text += `Grand Total: ${formatScore(model.getTotalComplexity())}\n`;
  return text;
}

export function generateUnusedReport(model: AnalysisModel): string {
  const records = model.getUnusedRecords();
  const fields = model.getUnusedFields();

  let text = 'Unused Dataclasses:\n';
  text += records.length > 0 ? records.map(r => `  ${r}\n`).join('') : '  (none)\n';
  text += 'Unused Fields:\n';
  text += fields.length > 0 ? fields.map(f => `  ${f.record}.${f.field}\n`).join('') : '  (none)\n';
  return text;
}

export function generateSectionTable(model: AnalysisModel): string {
  const sections = model.getSectionComplexity();
  if (sections.length === 0) {
    return 'Complexity Analysis:\n  (no functions)\n';
  }

  const table = formatTable(
    sections.map(section => ({
      function: section.name,
      lines: `${section.startLine}-${section.endLine}`,
      ...section.counts,
      total: section.total,
    })),
    { columns: ['function', 'lines', 'advanced', 'intermediate', 'basic', 'trivial', 'drafter', 'total'] }
  );
  return `Complexity Analysis:\n${table}\n`;
}
