/**
 * Process command - select columns and filter rows
 *
 * csvsieve process data.csv -c name,age -f "age>=18" -f "score<100"
 * csvsieve process --data "$(cat data.csv)" -c age,name
 *
 * Writes the resulting CSV to stdout. On failure the error message takes
 * the place of the CSV on stdout and the exit code is 1.
 */

import { Command } from 'commander';
import { readCsv, writeCsv } from '../sieve/csv.js';
import { sieveTable } from '../sieve/engine.js';
import { isSieveError } from '../sieve/errors.js';
import { readTextFile } from '../utils/fs.js';
import { output, outputError, outputUsageError, getOutputOptions, writeRaw } from '../utils/output.js';
import type { Logger } from '../utils/logger.js';
import { buildFilterSpec } from './filters.js';

interface ProcessOptions {
  data?: string;
  columns: string;
  filter: string[];
  filtersFile?: string;
}

/** Where the CSV comes from */
type CsvSource = { kind: 'file'; path: string } | { kind: 'data'; text: string };

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function resolveSource(file: string | undefined, data: string | undefined): CsvSource | string {
  if (file !== undefined && data !== undefined) {
    return 'Provide either a CSV file or --data, not both';
  }
  if (file !== undefined) {
    return { kind: 'file', path: file };
  }
  if (data !== undefined) {
    return { kind: 'data', text: data };
  }
  return 'Provide a CSV file or --data <csv>';
}

export function createProcessCommand(getLogger: () => Logger): Command {
  const cmd = new Command('process')
    .description('Select columns and filter rows of a CSV file or string')
    .argument('[file]', 'CSV file to read')
    .option('-d, --data <csv>', 'CSV text to process instead of a file')
    .option('-c, --columns <list>', 'Comma-separated output columns, in output order (default: all)', '')
    .option('-f, --filter <definition>', 'Filter definition such as "age>=18" (repeatable)', collect, [])
    .option('--filters-file <path>', 'File with one filter definition per line')
    .action((file: string | undefined, options: ProcessOptions) => {
      const source = resolveSource(file, options.data);
      if (typeof source === 'string') {
        outputUsageError(source);
        process.exit(1);
      }

      const logger = getLogger();
      const startedAt = performance.now();

      try {
        const filterSpec = buildFilterSpec(options.filter, options.filtersFile);
        const csvText = source.kind === 'file' ? readTextFile(source.path) : source.text;
        const table = readCsv(csvText);
        const result = sieveTable(table, options.columns, filterSpec);
        const csv = writeCsv(result);

        logger.debug({
          event: 'csv.processed',
          file: source.kind === 'file' ? source.path : undefined,
          rows_in: table.rows.length,
          rows_out: result.records.length,
          columns: result.headers.length,
          latency_ms: Math.round(performance.now() - startedAt),
        });

        if (getOutputOptions().json) {
          output({ columns: result.headers, row_count: result.records.length, csv });
          return;
        }
        writeRaw(csv);
      } catch (error) {
        if (!isSieveError(error)) throw error;
        logger.debug({ event: 'csv.failed', code: error.code, error: error.message });
        outputError(error.message, error.code);
        process.exit(1);
      }
    });

  return cmd;
}
