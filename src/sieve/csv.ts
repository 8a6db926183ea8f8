/**
 * CSV reading and writing
 *
 * Plain comma splitting: no quoting, no escaping. Lines end with \n, \r\n
 * or \r; empty lines are skipped.
 * Short rows are padded with empty strings, extra fields are dropped.
 */

import type { CsvRow, CsvTable, ProjectedTable } from './types.js';
import { NoHeadersError } from './errors.js';

const DELIMITER = ',';
const LINE_TERMINATOR = '\n';
const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Parse CSV text into headers and rows
 * @throws NoHeadersError if there is no non-empty line
 */
export function readCsv(csvText: string): CsvTable {
  const lines = csvText.split(LINE_BREAK).filter((line) => line.length > 0);
  const [headerLine, ...dataLines] = lines;

  if (headerLine === undefined) {
    throw new NoHeadersError();
  }

  const headers = headerLine.split(DELIMITER);
  const rows = dataLines.map((line) => toRow(headers, line.split(DELIMITER)));

  return { headers, rows };
}

function toRow(headers: readonly string[], fields: readonly string[]): CsvRow {
  // Own data properties, so a header such as __proto__ stays a column
  return Object.fromEntries(headers.map((header, i) => [header, fields[i] ?? '']));
}

/**
 * Serialize a projected table; values are written literally and every
 * line ends with a newline
 */
export function writeCsv(table: ProjectedTable): string {
  const lines = [
    table.headers.join(DELIMITER),
    ...table.records.map((values) => values.join(DELIMITER)),
  ];
  return lines.map((line) => line + LINE_TERMINATOR).join('');
}
