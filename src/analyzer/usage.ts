/**
 * Attribute usage and unused record/field audits
 */

import type { AttributeUsageTable, RecordType, UnusedField } from '../types/model.js';

/**
 * Credit every attribute access to each record declaring a field of that
 * name. Ownership is not inferred, so a shared field name is counted on
 * all records that declare it.
 */
export function buildAttributeUsage(
  records: ReadonlyMap<string, RecordType>,
  accesses: ReadonlyMap<string, number>
): AttributeUsageTable {
  const table: AttributeUsageTable = new Map();
  for (const record of records.values()) {
    const fields = new Map<string, number>();
    for (const field of record.fields.keys()) {
      fields.set(field, accesses.get(field) ?? 0);
    }
    table.set(record.name, fields);
  }
  return table;
}

function totalAccesses(usage: AttributeUsageTable, record: string): number {
  let total = 0;
  for (const count of usage.get(record)?.values() ?? []) {
    total += count;
  }
  return total;
}

/**
 * Records that no other record depends on and whose fields are never accessed.
 */
export function findUnusedRecords(
  records: ReadonlyMap<string, RecordType>,
  usage: AttributeUsageTable
): string[] {
  const referenced = new Set<string>();
  for (const record of records.values()) {
    for (const dependency of record.dependencies) {
      if (dependency !== record.name) referenced.add(dependency);
    }
  }

  return [...records.keys()].filter(
    name => !referenced.has(name) && totalAccesses(usage, name) === 0
  );
}

export function findUnusedFields(usage: AttributeUsageTable): UnusedField[] {
  const unused: UnusedField[] = [];
  for (const [record, fields] of usage) {
    for (const [field, count] of fields) {
      if (count === 0) unused.push({ record, field });
    }
  }
  return unused;
}
