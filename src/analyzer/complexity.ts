/**
 * Structural complexity weights for record field types
 */

import type { FieldComplexity, RecordComplexity, RecordType } from '../types/model.js';
import { baseTypeName, renderTypeName } from './type-names.js';

const PRIMITIVE_TYPES = new Set(['int', 'str', 'bool', 'float']);
const CONTAINER_TYPES = new Set(['dict', 'tuple', 'set']);

export const FIELD_SCORES = {
  primitive: 0.1,
  list: 1,
  record: 1,
  container: 10,
  other: 100,
} as const;

/**
 * Score a rendered field type by its base name, ignoring case.
 */
export function scoreFieldType(rendered: string, knownRecords: ReadonlySet<string>): number {
  const base = baseTypeName(rendered);
  const lower = base.toLowerCase();

  if (PRIMITIVE_TYPES.has(lower)) return FIELD_SCORES.primitive;
  if (lower === 'list') return FIELD_SCORES.list;
  if (knownRecords.has(base)) return FIELD_SCORES.record;
  if (CONTAINER_TYPES.has(lower)) return FIELD_SCORES.container;
  return FIELD_SCORES.other;
}

export function scoreRecord(record: RecordType, knownRecords: ReadonlySet<string>): RecordComplexity {
  const fields: FieldComplexity[] = [];
  let total = 0;

  for (const [field, annotation] of record.fields) {
    const type = renderTypeName(annotation);
    const score = scoreFieldType(type, knownRecords);
    fields.push({ record: record.name, field, type, score });
    total += score;
  }

  return { record: record.name, fields, total };
}
