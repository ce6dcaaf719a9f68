/**
 * CSV Loader
 *
 * Reads the galamsay site-count CSV into RawRows. Structural problems
 * (missing file, wrong header, wrong column count, unterminated quote) are
 * fatal for the whole run and surface as CsvFileError / CsvFormatError.
 * Field values are trimmed but never interpreted here.
 */

import fs from 'node:fs/promises';
import { CSV_COLUMNS, type RawRow } from '@shared/analysis-types';

export class CsvFileError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CsvFileError';
  }
}

export class CsvFormatError extends Error {
  constructor(
    message: string,
    readonly line: number
  ) {
    super(message);
    this.name = 'CsvFormatError';
  }
}

/**
 * Parse CSV content into raw rows.
 *
 * The first non-blank line must be the `City,Region,Number_of_Galamsay_Sites`
 * header. Blank lines are skipped; line numbers in the result are 1-based
 * physical line numbers so reports can point back into the file.
 */
export function parseCsv(content: string): RawRow[] {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);

  const headerIndex = lines.findIndex((l) => l.trim() !== '');
  if (headerIndex === -1) {
    throw new CsvFormatError(`Missing header: expected "${CSV_COLUMNS.join(',')}"`, 1);
  }

  const header = parseCsvLine(lines[headerIndex] ?? '', headerIndex + 1);
  const headerMatches =
    header.length === CSV_COLUMNS.length && CSV_COLUMNS.every((col, i) => header[i] === col);
  if (!headerMatches) {
    throw new CsvFormatError(
      `Malformed header "${header.join(',')}": expected "${CSV_COLUMNS.join(',')}"`,
      headerIndex + 1
    );
  }

  const rows: RawRow[] = [];
  for (let i = headerIndex + 1; i < lines.length; i++) {
    const text = lines[i] ?? '';
    if (text.trim() === '') continue;

    const lineNumber = i + 1;
    const values = parseCsvLine(text, lineNumber);
    if (values.length !== CSV_COLUMNS.length) {
      throw new CsvFormatError(
        `Line ${lineNumber}: expected ${CSV_COLUMNS.length} columns, found ${values.length}`,
        lineNumber
      );
    }

    const [city = '', region = '', siteCount = ''] = values;
    rows.push({ city, region, siteCount, line: lineNumber });
  }

  return rows;
}

/**
 * Read and parse a CSV file.
 */
export async function loadCsvFile(filePath: string): Promise<RawRow[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    const message = missing
      ? `File not found: ${filePath}`
      : `Error loading CSV ${filePath}: ${err instanceof Error ? err.message : String(err)}`;
    throw new CsvFileError(message, filePath, { cause: err });
  }

  return parseCsv(content);
}

/**
 * Split a single CSV line, honouring double-quoted fields and `""` escapes.
 */
function parseCsvLine(line: string, lineNumber: number): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (inQuotes) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      values.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  if (inQuotes) {
    throw new CsvFormatError(`Line ${lineNumber}: unterminated quoted field`, lineNumber);
  }
  values.push(current.trim());

  return values;
}
