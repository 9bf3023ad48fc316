/**
 * CSV parsing for system key exports
 *
 * Small line-oriented parser: a header row followed by data rows, quoted
 * fields may contain commas and doubled quotes (`""`). Header names are
 * trimmed; field values are kept exactly as written.
 * Quoted fields spanning several lines are not supported.
 */

export interface ParsedCSVRow {
  /** 1-based line number in the source file */
  readonly lineNumber: number;
  readonly values: readonly string[];
}

export interface ParsedCSV {
  /** Lower-cased, trimmed header names */
  readonly headers: readonly string[];
  readonly rows: readonly ParsedCSVRow[];
}

/**
 * Parse CSV content. Blank lines are skipped; an empty document has no headers.
 */
export function parseCSV(content: string): ParsedCSV {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);

  let headers: string[] | null = null;
  const rows: ParsedCSVRow[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line === undefined || !line.trim()) {
      continue;
    }

    if (headers === null) {
      headers = parseCSVLine(line).map((h) => h.trim().toLowerCase());
      continue;
    }

    rows.push({ lineNumber: i + 1, values: parseCSVLine(line) });
  }

  return { headers: headers ?? [], rows };
}

/**
 * Parse a single CSV line handling quoted values
 */
export function parseCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (char === '"') {
      if (inQuotes && line.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      values.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  values.push(current);

  return values;
}
