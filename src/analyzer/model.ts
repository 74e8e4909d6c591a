/**
 * Finished analysis of one Python source file.
 *
 * Queries return fresh copies; only `addRecord` and `resolveDependencies`
 * change the model.
 */

import type { ModuleNode, PyNode } from '../parser/nodes.js';
import type {
  AttributeUsageTable,
  Edge,
  FieldComplexity,
  RecordComplexity,
  RecordInfo,
  RecordType,
  RouteHandler,
  RouteInfo,
  SectionComplexity,
  UnusedField,
} from '../types/model.js';
import { scoreRecord } from './complexity.js';
import { resolveDependencies } from './dependencies.js';
import { scoreSections } from './sections.js';
import { renderTypeName } from './type-names.js';
import { buildAttributeUsage, findUnusedFields, findUnusedRecords } from './usage.js';
import type { TraversalResult } from './visitor.js';

export class AnalysisModel {
  private readonly records: Map<string, RecordType>;
  private readonly routes: RouteHandler[];
  private readonly componentUsage: Map<string, number>;
  private readonly callGraph: Map<string, Set<string>>;
  private readonly attributeAccesses: Map<string, number>;
  private readonly sections: SectionComplexity[];

  constructor(traversal: TraversalResult, module: ModuleNode, components?: readonly string[]) {
    this.records = traversal.records;
    this.routes = traversal.routes;
    this.componentUsage = traversal.componentUsage;
    this.callGraph = traversal.callGraph;
    this.attributeAccesses = traversal.attributeAccesses;
    this.sections = scoreSections(module, components);
    this.resolveDependencies();
  }

  /**
   * Recompute every record's dependencies against the current record set.
   */
  resolveDependencies(): void {
    resolveDependencies(this.records);
  }

  /**
   * Insert or replace a record. Dependencies are not recomputed until
   * `resolveDependencies` is called.
   */
  addRecord(name: string, fields: Map<string, PyNode>, baseTypes: string[] = []): void {
    this.records.set(name, {
      name,
      fields: new Map(fields),
      baseTypes: [...baseTypes],
      dependencies: new Set(),
      location: { startLine: 0, endLine: 0 },
    });
  }

  renderType(node: PyNode): string {
    return renderTypeName(node);
  }

  getRecords(): RecordInfo[] {
    return [...this.records.values()].map(toRecordInfo);
  }

  getRecord(name: string): RecordInfo | undefined {
    const record = this.records.get(name);
    return record ? toRecordInfo(record) : undefined;
  }

  getRecordNames(): string[] {
    return [...this.records.keys()];
  }

  getRoutes(): RouteInfo[] {
    return this.routes.map(toRouteInfo);
  }

  /**
   * Latest route declared under this name
   */
  getRoute(name: string): RouteInfo | undefined {
    const route = this.routes.findLast(r => r.name === name);
    return route ? toRouteInfo(route) : undefined;
  }

  getComponentUsage(): Map<string, number> {
    return new Map(this.componentUsage);
  }

  getCallGraph(): Map<string, string[]> {
    return new Map([...this.callGraph].map(([route, calls]) => [route, [...calls]]));
  }

  getAttributeUsage(): AttributeUsageTable {
    return buildAttributeUsage(this.records, this.attributeAccesses);
  }

  getRecordComplexity(name: string): RecordComplexity | undefined {
    const record = this.records.get(name);
    return record ? scoreRecord(record, this.knownRecords()) : undefined;
  }

  getFieldComplexity(name: string): FieldComplexity[] {
    return this.getRecordComplexity(name)?.fields ?? [];
  }

  getComplexity(): RecordComplexity[] {
    const known = this.knownRecords();
    return [...this.records.values()].map(record => scoreRecord(record, known));
  }

  getTotalComplexity(): number {
    return this.getComplexity().reduce((sum, record) => sum + record.total, 0);
  }

  getUnusedRecords(): string[] {
    return findUnusedRecords(this.records, this.getAttributeUsage());
  }

  getUnusedFields(): UnusedField[] {
    return findUnusedFields(this.getAttributeUsage());
  }

  /**
   * Composition edges between known records only
   */
  getCompositionEdges(): Edge[] {
    const edges: Edge[] = [];
    for (const record of this.records.values()) {
      for (const dependency of record.dependencies) {
        if (this.records.has(dependency)) {
          edges.push({ from: record.name, to: dependency });
        }
      }
    }
    return edges;
  }

  /**
   * Call edges; targets may be names defined outside the file
   */
  getCallEdges(): Edge[] {
    const edges: Edge[] = [];
    for (const [route, calls] of this.callGraph) {
      for (const call of calls) {
        edges.push({ from: route, to: call });
      }
    }
    return edges;
  }

  getSectionComplexity(): SectionComplexity[] {
    return this.sections.map(section => ({ ...section, counts: { ...section.counts } }));
  }

  private knownRecords(): Set<string> {
    return new Set(this.records.keys());
  }
}

function toRecordInfo(record: RecordType): RecordInfo {
  return {
    name: record.name,
    fields: [...record.fields].map(([name, annotation]) => ({ name, type: renderTypeName(annotation) })),
    baseTypes: [...record.baseTypes],
    dependencies: [...record.dependencies],
    location: { ...record.location },
  };
}

function toRouteInfo(route: RouteHandler): RouteInfo {
  return {
    name: route.name,
    signature: route.signature,
    parameters: [...route.parameters],
    componentUsage: Object.fromEntries(route.componentUsage),
    fieldsUsed: [...route.fieldsUsed],
    calledNames: [...route.calledNames],
    location: { ...route.location },
  };
}
