/**
 * csvsieve types
 *
 * A filter definition is one line: `column operator value`, e.g. `age>=18`.
 * Definitions are newline-separated and all of them must hold (implicit AND).
 */

/** Comparison operators, in the order the parser looks for them */
export type ComparisonOperator = '!=' | '>=' | '<=' | '=' | '>' | '<';

/** Single parsed filter definition */
export interface FilterPredicate {
  column: string;
  operator: ComparisonOperator;
  /** Raw comparison text; parsed as an integer at evaluation time */
  value: string;
}

/** One data row, keyed by header name */
export type CsvRow = Record<string, string>;

/** Parsed CSV: header line plus data rows */
export interface CsvTable {
  headers: string[];
  rows: CsvRow[];
}

/** Projected output: column names plus row values in that order */
export interface ProjectedTable {
  headers: string[];
  records: string[][];
}

/** Output sink used by the host surface */
export type WriteFn = (text: string) => void;
