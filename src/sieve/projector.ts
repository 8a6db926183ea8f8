/**
 * Column projector
 *
 * Resolves the caller's column list against the CSV headers and
 * projects rows onto it. Caller order is kept; duplicates are allowed.
 */

import type { CsvRow } from './types.js';
import { HeaderNotFoundError } from './errors.js';

/**
 * Resolve the selected-columns specification
 * @param headers - CSV headers in file order
 * @param selectedColumnsSpec - Comma-separated names; empty selects every header
 * @returns Column names in output order
 */
export function selectHeaders(headers: readonly string[], selectedColumnsSpec: string): string[] {
  if (!selectedColumnsSpec.trim()) {
    return [...headers];
  }
  return selectedColumnsSpec.split(',').map((column) => column.trim());
}

/**
 * Fail on the first column missing from the header set
 * @throws HeaderNotFoundError
 */
export function validateHeaders(columns: readonly string[], headers: readonly string[]): void {
  const known = new Set(headers);
  for (const column of columns) {
    if (!known.has(column)) {
      throw new HeaderNotFoundError(column);
    }
  }
}

/**
 * Values of a row in the given column order
 * @throws HeaderNotFoundError if the row lacks one of the columns
 */
export function projectRow(row: CsvRow, columns: readonly string[]): string[] {
  return columns.map((column) => {
    if (!Object.hasOwn(row, column)) {
      throw new HeaderNotFoundError(column);
    }
    return row[column];
  });
}
