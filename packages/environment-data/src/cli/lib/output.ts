/**
 * Output Formatting for CLI Commands
 *
 * @module cli/lib/output
 */

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const format = (col: TableColumn, row: T): string => {
    const value = row[col.key];
    return col.formatter ? col.formatter(value) : String(value ?? '');
  };

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => format(col, row).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(format(col, row), widths[i], col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Human-readable byte count
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
