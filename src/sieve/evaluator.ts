/**
 * Predicate evaluator
 *
 * A row is kept when every predicate holds (implicit AND).
 * Comparisons are integer comparisons; both sides must parse.
 */

import type { ComparisonOperator, CsvRow, FilterPredicate } from './types.js';
import { HeaderNotFoundError, NumericParseError } from './errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Check a row against all predicates
 * @returns true if the row satisfies every predicate (empty list: true)
 * @throws HeaderNotFoundError if a predicate names a column the row lacks
 * @throws NumericParseError if a cell or filter value is not an integer
 */
export function matches(row: CsvRow, predicates: readonly FilterPredicate[]): boolean {
  return predicates.every((predicate) => evaluatePredicate(row, predicate));
}

function evaluatePredicate(row: CsvRow, predicate: FilterPredicate): boolean {
  if (!Object.hasOwn(row, predicate.column)) {
    throw new HeaderNotFoundError(predicate.column);
  }

  const cell = parseInteger(row[predicate.column], predicate.column);
  const value = parseInteger(predicate.value, predicate.column);

  return compare(cell, predicate.operator, value);
}

/**
 * Parse a base-10 integer literal (optional sign, surrounding whitespace allowed)
 */
export function parseInteger(text: string, column: string): bigint {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new NumericParseError(text, column);
  }
  return BigInt(trimmed.startsWith('+') ? trimmed.slice(1) : trimmed);
}

/**
 * Integer comparison for one operator
 */
export function compare(left: bigint, operator: ComparisonOperator, right: bigint): boolean {
  switch (operator) {
    case '!=':
      return left !== right;
    case '>=':
      return left >= right;
    case '<=':
      return left <= right;
    case '=':
      return left === right;
    case '>':
      return left > right;
    case '<':
      return left < right;
  }
}
