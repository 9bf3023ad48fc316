/**
 * Output Formatting for CLI Commands and Reports
 *
 * Supports: table, json, csv formats
 *
 * @module cli/lib/output
 */

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'csv'];

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'table' || value === 'json' || value === 'csv';
}

/**
 * Column definition for table and CSV output
 */
export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function formatCell<T>(row: T, col: TableColumn<T>): string {
  const value = row[col.key];
  return col.formatter ? col.formatter(value) : String(value ?? '');
}

/**
 * Format data as a table
 */
export function formatTable<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  // Calculate column widths
  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => formatCell(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => {
        const formatted = formatCell(row, col);
        return padCell(formatted, widths[i] ?? formatted.length, col.align ?? 'left');
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format data as JSON
 */
export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as CSV (header row always present)
 */
export function formatCsv<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');

  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(formatCell(row, col))).join(',')
  );

  return [headerRow, ...dataRows].join('\n');
}

/**
 * Escape a value for CSV output
 */
export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format data in the specified format
 */
export function formatOutput<T>(
  data: readonly T[],
  format: OutputFormat,
  columns: readonly TableColumn<T>[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
    default:
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Format a date string with time
   */
  datetime: (value: unknown): string => {
    if (!value) return '-';
    const date = new Date(String(value));
    return isNaN(date.getTime()) ? String(value) : date.toISOString().replace('T', ' ').slice(0, 19);
  },

  /**
   * Format a percentage with one decimal
   */
  percent: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : `${num.toFixed(1)}%`;
  },

  /**
   * Show '-' for absent values
   */
  optional: (value: unknown): string => {
    return value === null || value === undefined || value === '' ? '-' : String(value);
  },
};

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
