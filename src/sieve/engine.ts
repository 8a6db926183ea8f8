/**
 * CSV engine
 *
 * read -> select columns -> parse filters -> keep matching rows -> project -> write
 *
 * Check order is fixed: selected columns, then filter syntax, then filter
 * columns, then cell values row by row.
 */

import type { CsvTable, ProjectedTable } from './types.js';
import { InvalidInputError } from './errors.js';
import { readTextFile } from '../utils/fs.js';
import { readCsv, writeCsv } from './csv.js';
import { parseFilters } from './filters.js';
import { matches } from './evaluator.js';
import { projectRow, selectHeaders, validateHeaders } from './projector.js';

/**
 * Process CSV text held in memory
 * @param csvText - CSV with a header line
 * @param selectedColumnsSpec - Comma-separated output columns; empty keeps all
 * @param filterSpec - Newline-separated filter definitions; empty keeps all rows
 * @returns The projected, filtered CSV
 */
export function processCsvData(
  csvText: string,
  selectedColumnsSpec: string,
  filterSpec: string
): string {
  assertInputs({ csvText, selectedColumnsSpec, filterSpec });
  return writeCsv(sieveTable(readCsv(csvText), selectedColumnsSpec, filterSpec));
}

/**
 * Process a CSV file: read it whole, then behave as processCsvData
 * @throws FileAccessError if the file cannot be read
 */
export function processCsvFile(
  filePath: string,
  selectedColumnsSpec: string,
  filterSpec: string
): string {
  assertInputs({ filePath, selectedColumnsSpec, filterSpec });
  return processCsvData(readTextFile(filePath), selectedColumnsSpec, filterSpec);
}

/**
 * Apply column selection and filters to a parsed table
 */
export function sieveTable(
  table: CsvTable,
  selectedColumnsSpec: string,
  filterSpec: string
): ProjectedTable {
  const headers = selectHeaders(table.headers, selectedColumnsSpec);
  validateHeaders(headers, table.headers);

  const predicates = parseFilters(filterSpec);
  validateHeaders(
    predicates.map((p) => p.column),
    table.headers
  );

  const records = table.rows
    .filter((row) => matches(row, predicates))
    .map((row) => projectRow(row, headers));

  return { headers, records };
}

function assertInputs(inputs: Record<string, unknown>): void {
  for (const [name, value] of Object.entries(inputs)) {
    if (typeof value !== 'string') {
      throw new InvalidInputError(name);
    }
  }
}
