/**
 * Single-pass traversal that discovers records and routes.
 *
 * The active route is passed down explicitly; code reached while no route
 * is active contributes nothing to call edges or field usage.
 */

import {
  calleeName,
  childNodes,
  type CallNode,
  type ClassDefNode,
  type FunctionDefNode,
  type ModuleNode,
  type PyNode,
} from '../parser/nodes.js';
import type { AnalyzeOptions, RecordType, RouteHandler } from '../types/model.js';
import { COMPONENTS, NAVIGATION_COMPONENTS, RECORD_MARKERS, ROUTE_MARKERS } from './components.js';

export interface TraversalResult {
  records: Map<string, RecordType>;
  /** Every route in declaration order, re-declarations included */
  routes: RouteHandler[];
  /** Component name -> invocations anywhere in the file */
  componentUsage: Map<string, number>;
  /** Route name -> names it calls or links to */
  callGraph: Map<string, Set<string>>;
  /** Attribute name -> accesses made inside routes */
  attributeAccesses: Map<string, number>;
}

interface ResolvedOptions {
  recordMarkers: Set<string>;
  routeMarkers: Set<string>;
  components: Set<string>;
  navigationComponents: Set<string>;
}

export function resolveOptions(options: AnalyzeOptions = {}): ResolvedOptions {
  return {
    recordMarkers: new Set(options.recordMarkers ?? RECORD_MARKERS),
    routeMarkers: new Set(options.routeMarkers ?? ROUTE_MARKERS),
    components: new Set(options.components ?? COMPONENTS),
    navigationComponents: new Set(options.navigationComponents ?? NAVIGATION_COMPONENTS),
  };
}

export function traverse(module: ModuleNode, options: AnalyzeOptions = {}): TraversalResult {
  const visitor = new ModelVisitor(resolveOptions(options));
  visitor.visit(module, null);
  return visitor.result;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

class ModelVisitor {
  readonly result: TraversalResult = {
    records: new Map(),
    routes: [],
    componentUsage: new Map(),
    callGraph: new Map(),
    attributeAccesses: new Map(),
  };

  constructor(private readonly options: ResolvedOptions) {}

  visit(node: PyNode, route: RouteHandler | null): void {
    switch (node.kind) {
      case 'ClassDef':
        this.visitClassDef(node, route);
        return;
      case 'FunctionDef':
        this.visitFunctionDef(node, route);
        return;
      case 'Call':
        this.visitCall(node, route);
        return;
      case 'Return':
        if (route && node.value?.kind === 'Call') {
          const name = calleeName(node.value);
          if (name) this.addCall(route, name);
        }
        break;
      case 'Attribute':
        if (route && node.ctx !== 'del') {
          route.fieldsUsed.add(node.attr);
          increment(this.result.attributeAccesses, node.attr);
        }
        break;
      default:
        break;
    }
    this.visitChildren(node, route);
  }

  private visitChildren(node: PyNode, route: RouteHandler | null): void {
    for (const child of childNodes(node)) {
      this.visit(child, route);
    }
  }

  private visitClassDef(node: ClassDefNode, route: RouteHandler | null): void {
    const isRecord = node.decorators.some(
      d => d.kind === 'Name' && this.options.recordMarkers.has(d.id)
    );

    if (isRecord) {
      const fields = new Map<string, PyNode>();
      for (const statement of node.body) {
        if (statement.kind === 'AnnAssign' && statement.target.kind === 'Name') {
          fields.set(statement.target.id, statement.annotation);
        }
      }

      const baseTypes = node.bases.flatMap(base => (base.kind === 'Name' ? [base.id] : []));

      this.result.records.set(node.name, {
        name: node.name,
        fields,
        baseTypes,
        dependencies: new Set(),
        location: { startLine: node.startLine, endLine: node.endLine },
      });
    }

    this.visitChildren(node, route);
  }

  private visitFunctionDef(node: FunctionDefNode, route: RouteHandler | null): void {
    if (!this.isRoute(node)) {
      this.visitChildren(node, route);
      return;
    }

    const handler: RouteHandler = {
      name: node.name,
      signature: `${node.name}(${node.params.join(', ')})`,
      parameters: [...node.params],
      componentUsage: new Map(),
      fieldsUsed: new Set(),
      calledNames: new Set(),
      location: { startLine: node.startLine, endLine: node.endLine },
    };
    this.result.routes.push(handler);

    for (const statement of node.body) {
      this.visit(statement, handler);
    }
  }

  private isRoute(node: FunctionDefNode): boolean {
    return node.decorators.some(decorator => {
      if (decorator.kind === 'Name') {
        return this.options.routeMarkers.has(decorator.id);
      }
      if (decorator.kind === 'Call' && decorator.func.kind === 'Name') {
        return this.options.routeMarkers.has(decorator.func.id);
      }
      return false;
    });
  }

  private visitCall(node: CallNode, route: RouteHandler | null): void {
    const name = calleeName(node);

    if (name !== null && this.options.components.has(name)) {
      increment(this.result.componentUsage, name);
      if (route) {
        increment(route.componentUsage, name);
        if (this.options.navigationComponents.has(name)) {
          const target = navigationTarget(node);
          if (target) this.addCall(route, target);
        }
      }
    } else if (name !== null && route) {
      this.addCall(route, name);
    }

    this.visitChildren(node, route);
  }

  private addCall(route: RouteHandler, name: string): void {
    route.calledNames.add(name);
    let edges = this.result.callGraph.get(route.name);
    if (!edges) {
      edges = new Set();
      this.result.callGraph.set(route.name, edges);
    }
    edges.add(name);
  }
}

/**
 * Second positional argument of a navigation component, when it is a bare
 * name or a string literal.
 */
function navigationTarget(call: CallNode): string | null {
  const target = call.args[1];
  if (!target) return null;
  if (target.kind === 'Name') return target.id;
  if (target.kind === 'Constant' && typeof target.value === 'string') return target.value;
  return null;
}
