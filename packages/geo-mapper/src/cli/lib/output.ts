/**
 * Output Formatting for CLI Commands
 *
 * Command results go to stdout as an aligned table or JSON; log lines and
 * errors go to stderr.
 *
 * @module cli/lib/output
 */

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as a table with a header and separator line
 */
export function formatTable(
  data: readonly Readonly<Record<string, unknown>>[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => String(row[col.key] ?? '').length))
  );

  const pad = (value: string, width: number, align: 'left' | 'right'): string =>
    align === 'right' ? value.padStart(width) : value.padEnd(width);

  const headerRow = columns
    .map((col, i) => pad(col.header, widths[i] ?? 0, col.align ?? 'left'))
    .join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns
      .map((col, i) => pad(String(row[col.key] ?? ''), widths[i] ?? 0, col.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
