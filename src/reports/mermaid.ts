/**
 * Mermaid diagrams for record composition and route calls
 */

import type { AnalysisModel } from '../analyzer/model.js';

export function generateClassDiagram(model: AnalysisModel): string {
  let mermaid = 'classDiagram\n';
  const edges = model.getCompositionEdges();

  for (const record of model.getRecords()) {
    mermaid += `    class ${record.name} {\n`;
    for (const field of record.fields) {
      mermaid += `        ${field.type} ${field.name}\n`;
    }
    mermaid += '    }\n';
    for (const edge of edges.filter(e => e.from === record.name)) {
      mermaid += `    ${edge.from} --> ${edge.to}\n`;
    }
  }

  return mermaid;
}

export function generateFunctionDiagram(model: AnalysisModel): string {
  let mermaid = 'graph TD\n';
  for (const edge of model.getCallEdges()) {
    mermaid += `    ${edge.from} --> ${edge.to}\n`;
  }
  return mermaid;
}
