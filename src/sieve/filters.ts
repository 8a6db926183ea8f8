/**
 * Filter definition parser
 *
 * Grammar (one definition per line):
 *   definition = column operator value
 *   operator   = '!=' | '>=' | '<=' | '=' | '>' | '<'
 *
 * Column and value are whatever sits left and right of the operator,
 * trimmed. Quotes have no special meaning.
 */

import type { ComparisonOperator, FilterPredicate } from './types.js';
import { InvalidFilterError } from './errors.js';

/** Operators in priority order: two-character tokens before their prefixes */
export const OPERATORS: readonly ComparisonOperator[] = ['!=', '>=', '<=', '=', '>', '<'];

/**
 * Parse newline-separated filter definitions
 * @param filterSpec - Definitions, one per line; empty lines are skipped
 * @returns Predicates in definition order
 */
export function parseFilters(filterSpec: string): FilterPredicate[] {
  const predicates: FilterPredicate[] = [];

  for (const line of filterSpec.split(/\r\n|\r|\n/)) {
    if (line.length === 0) continue;
    predicates.push(parseFilter(line));
  }

  return predicates;
}

/**
 * Parse a single filter definition
 * @throws InvalidFilterError when the line holds none of the operators
 */
export function parseFilter(definition: string): FilterPredicate {
  for (const operator of OPERATORS) {
    const index = definition.indexOf(operator);
    if (index === -1) continue;

    return {
      column: definition.slice(0, index).trim(),
      operator,
      value: definition.slice(index + operator.length).trim(),
    };
  }

  throw new InvalidFilterError(definition);
}

/**
 * Render a predicate back to its definition form
 */
export function formatFilter(predicate: FilterPredicate): string {
  return `${predicate.column}${predicate.operator}${predicate.value}`;
}
