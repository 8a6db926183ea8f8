/**
 * csvsieve core
 *
 * Public API for column projection and row filtering of CSV text.
 */

// Types
export type {
  ComparisonOperator,
  CsvRow,
  CsvTable,
  FilterPredicate,
  ProjectedTable,
  WriteFn,
} from './types.js';

// Errors
export type { SieveErrorCode } from './errors.js';
export {
  SieveError,
  InvalidInputError,
  NoHeadersError,
  HeaderNotFoundError,
  InvalidFilterError,
  NumericParseError,
  FileAccessError,
  isSieveError,
} from './errors.js';

// Stages
export { readCsv, writeCsv } from './csv.js';
export { OPERATORS, parseFilters, parseFilter, formatFilter } from './filters.js';
export { matches, compare, parseInteger } from './evaluator.js';
export { selectHeaders, validateHeaders, projectRow } from './projector.js';

// Operations
export { processCsvData, processCsvFile, sieveTable } from './engine.js';
export { emitCsvData, emitCsvFile } from './surface.js';
