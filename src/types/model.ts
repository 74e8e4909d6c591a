/**
 * Core model types for drafter-lens
 */

import type { PyNode } from '../parser/nodes.js';

export interface Location {
  startLine: number;
  endLine: number;
}

/**
 * A dataclass-style record discovered in the source.
 */
export interface RecordType {
  name: string;
  /** Field name -> annotation node, in declaration order */
  fields: Map<string, PyNode>;
  baseTypes: string[];
  /** Names of other known records referenced by field types */
  dependencies: Set<string>;
  location: Location;
}

/**
 * A route-decorated page handler.
 */
export interface RouteHandler {
  name: string;
  signature: string;
  parameters: string[];
  componentUsage: Map<string, number>;
  fieldsUsed: Set<string>;
  calledNames: Set<string>;
  location: Location;
}

/** Record name -> field name -> access count */
export type AttributeUsageTable = Map<string, Map<string, number>>;

export interface FieldInfo {
  name: string;
  type: string;
}

export interface RecordInfo {
  name: string;
  fields: FieldInfo[];
  baseTypes: string[];
  dependencies: string[];
  location: Location;
}

export interface RouteInfo {
  name: string;
  signature: string;
  parameters: string[];
  componentUsage: Record<string, number>;
  fieldsUsed: string[];
  calledNames: string[];
  location: Location;
}

export interface FieldComplexity {
  record: string;
  field: string;
  type: string;
  score: number;
}

export interface RecordComplexity {
  record: string;
  fields: FieldComplexity[];
  total: number;
}

export interface UnusedField {
  record: string;
  field: string;
}

export interface Edge {
  from: string;
  to: string;
}

export type ComplexityCategory = 'advanced' | 'intermediate' | 'basic' | 'trivial';

export type SectionCategory = ComplexityCategory | 'drafter';

export interface SectionComplexity {
  /** Function name, qualified by enclosing class or function */
  name: string;
  startLine: number;
  endLine: number;
  counts: Record<SectionCategory, number>;
  /** Weighted sum of the severity categories */
  total: number;
}

export interface AnalyzeOptions {
  /** Bare decorator names that mark a class as a record */
  recordMarkers?: string[];
  /** Decorator names (bare or called) that mark a function as a route */
  routeMarkers?: string[];
  /** Recognized component kinds */
  components?: string[];
  /** Component kinds whose second positional argument names a route */
  navigationComponents?: string[];
}
