/**
 * JSON export of the whole query surface
 */

import type { AnalysisModel } from '../analyzer/model.js';
import type {
  Edge,
  RecordComplexity,
  RecordInfo,
  RouteInfo,
  SectionComplexity,
  UnusedField,
} from '../types/model.js';

export interface AnalysisReport {
  records: RecordInfo[];
  routes: RouteInfo[];
  componentUsage: Record<string, number>;
  callGraph: Record<string, string[]>;
  attributeUsage: Record<string, Record<string, number>>;
  complexity: {
    records: RecordComplexity[];
    total: number;
  };
  unused: {
    records: string[];
    fields: UnusedField[];
  };
  compositionEdges: Edge[];
  callEdges: Edge[];
  sections: SectionComplexity[];
}

export function buildReport(model: AnalysisModel): AnalysisReport {
  const attributeUsage = Object.fromEntries(
    [...model.getAttributeUsage()].map(([record, fields]) => [record, Object.fromEntries(fields)])
  );

  return {
    records: model.getRecords(),
    routes: model.getRoutes(),
    componentUsage: Object.fromEntries(model.getComponentUsage()),
    callGraph: Object.fromEntries(model.getCallGraph()),
    attributeUsage,
    complexity: {
      records: model.getComplexity(),
      total: model.getTotalComplexity(),
    },
    unused: {
      records: model.getUnusedRecords(),
      fields: model.getUnusedFields(),
    },
    compositionEdges: model.getCompositionEdges(),
    callEdges: model.getCallEdges(),
    sections: model.getSectionComplexity(),
  };
}

export function generateJson(model: AnalysisModel): string {
  return JSON.stringify(buildReport(model), null, 2);
}
