/**
 * CSV exports (RFC 4180 quoting)
 */

import type { AnalysisModel } from '../analyzer/model.js';

type CsvValue = string | number;

export function escapeCsv(value: CsvValue): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

function toCsv(header: string[], rows: CsvValue[][]): string {
  return [header, ...rows].map(row => row.map(escapeCsv).join(',')).join('\r\n') + '\r\n';
}

/**
 * One row per record field: type, complexity score and access count
 */
export function generateRecordsCsv(model: AnalysisModel): string {
  const usage = model.getAttributeUsage();
  const rows: CsvValue[][] = [];

  for (const record of model.getComplexity()) {
    for (const field of record.fields) {
      rows.push([
        record.record,
        field.field,
        field.type,
        field.score,
        usage.get(record.record)?.get(field.field) ?? 0,
      ]);
    }
  }

  return toCsv(['record', 'field', 'type', 'score', 'usage'], rows);
}

export function generateRoutesCsv(model: AnalysisModel): string {
  const rows = model.getRoutes().map(route => [
    route.name,
    route.signature,
    Object.entries(route.componentUsage)
      .map(([component, count]) => `${component}:${count}`)
      .join(';'),
    route.fieldsUsed.join(';'),
    route.calledNames.join(';'),
  ]);

  return toCsv(['route', 'signature', 'components', 'fields_used', 'calls'], rows);
}
