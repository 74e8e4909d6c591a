/**
 * Composition resolution over the final record set
 */

import type { RecordType } from '../types/model.js';
import { baseTypeName, renderTypeName, typeArguments } from './type-names.js';

/**
 * Recompute every record's dependencies from its field types. Idempotent:
 * each set is cleared and rebuilt from the current record map.
 */
export function resolveDependencies(records: Map<string, RecordType>): void {
  for (const record of records.values()) {
    record.dependencies.clear();
    for (const annotation of record.fields.values()) {
      collectTypeDependencies(renderTypeName(annotation), record, records);
    }
  }
}

function collectTypeDependencies(
  rendered: string,
  owner: RecordType,
  records: Map<string, RecordType>
): void {
  const base = baseTypeName(rendered);
  if (records.has(base) && base !== owner.name) {
    owner.dependencies.add(base);
  }
  collectArgumentDependencies(rendered, owner, records);
}

function collectArgumentDependencies(
  rendered: string,
  owner: RecordType,
  records: Map<string, RecordType>
): void {
  for (const part of typeArguments(rendered) ?? []) {
    if (records.has(part)) {
      if (part !== owner.name) owner.dependencies.add(part);
    } else if (part.includes('[')) {
      collectArgumentDependencies(part, owner, records);
    }
  }
}
