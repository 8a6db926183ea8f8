/**
 * Error types for csvsieve
 *
 * Every failure of a sieve call is a SieveError; the message is the single
 * line reported to the caller.
 */

export type SieveErrorCode =
  | 'INVALID_INPUT'
  | 'NO_HEADERS'
  | 'HEADER_NOT_FOUND'
  | 'INVALID_FILTER'
  | 'NUMERIC_PARSE'
  | 'FILE_ACCESS';

export class SieveError extends Error {
  constructor(
    message: string,
    public readonly code: SieveErrorCode
  ) {
    super(message);
    this.name = 'SieveError';
  }
}

export class InvalidInputError extends SieveError {
  constructor(public readonly parameter: string) {
    super(`Null input: ${parameter}`, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class NoHeadersError extends SieveError {
  constructor() {
    super('CSV data has no headers', 'NO_HEADERS');
    this.name = 'NoHeadersError';
  }
}

export class HeaderNotFoundError extends SieveError {
  constructor(public readonly header: string) {
    super(`Header '${header}' not found in CSV file/string`, 'HEADER_NOT_FOUND');
    this.name = 'HeaderNotFoundError';
  }
}

export class InvalidFilterError extends SieveError {
  constructor(public readonly definition: string) {
    super(`Invalid filter: '${definition}'`, 'INVALID_FILTER');
    this.name = 'InvalidFilterError';
  }
}

export class NumericParseError extends SieveError {
  constructor(
    public readonly value: string,
    public readonly column: string
  ) {
    super(`Value '${value}' in column '${column}' is not an integer`, 'NUMERIC_PARSE');
    this.name = 'NumericParseError';
  }
}

export class FileAccessError extends SieveError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Cannot read file '${path}': ${reason}`, 'FILE_ACCESS');
    this.name = 'FileAccessError';
  }
}

/**
 * Type guard for sieve errors
 */
export function isSieveError(error: unknown): error is SieveError {
  return error instanceof SieveError;
}
