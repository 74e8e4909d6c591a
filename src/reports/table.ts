/**
 * Column-aligned tables for console output
 */

export type TableField = string | number | boolean | null | undefined;
export type TableRecord = Record<string, TableField>;

function sanitizeValue(value: TableField): string {
  if (value == null) return '';
  return String(value)
    .replaceAll('\t', '    ')
    .replaceAll('\r\n', '\\n')
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\n');
}

/**
 * Render records as a header row plus one row per record, each column
 * padded to its widest cell and separated by two spaces.
 */
export function formatTable(records: TableRecord[], opts?: { columns?: string[] }): string {
  const columns = opts?.columns?.length
    ? opts.columns
    : Array.from(
        records.reduce((keys, record) => {
          for (const key of Object.keys(record)) {
            keys.add(key);
          }
          return keys;
        }, new Set<string>())
      );

  if (columns.length === 0) {
    return '';
  }

  const rows = [
    columns,
    ...records.map(record => columns.map(column => sanitizeValue(record[column]))),
  ];
  const widths = columns.map((_, i) => Math.max(...rows.map(row => (row[i] ?? '').length)));

  return rows
    .map(row => row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd())
    .join('\n');
}
