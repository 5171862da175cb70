/**
 * Output Formatting for CLI Commands
 *
 * Table and JSON rendering shared by every command.
 *
 * @module cli/lib/output
 */

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly value: (row: T) => string;
}

/**
 * Format rows as a plain-text table
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((col) => col.value(row)));

  const widths = columns.map((col, i) => {
    if (col.width) return col.width;
    return Math.max(col.header.length, ...cells.map((row) => row[i].length));
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = cells.map((row) =>
    row.map((cell, i) => padCell(cell, widths[i], columns[i].align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format aligned `label: value` lines
 */
export function formatFields(fields: readonly (readonly [string, string])[]): string {
  const width = Math.max(...fields.map(([label]) => label.length)) + 1;
  return fields.map(([label, value]) => `${`${label}:`.padEnd(width)} ${value}`).join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
