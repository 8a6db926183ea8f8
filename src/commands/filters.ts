/**
 * Filters command - parse filter definitions without touching any CSV
 *
 * csvsieve filters "age>=18" "score!=0"
 * csvsieve filters --filters-file filters.txt
 */

import { Command } from 'commander';
import { formatFilter, parseFilters } from '../sieve/filters.js';
import { isSieveError } from '../sieve/errors.js';
import { readTextFile } from '../utils/fs.js';
import { output, outputError } from '../utils/output.js';
import type { Logger } from '../utils/logger.js';

/**
 * Join filter definitions from a file and from arguments into one spec.
 * File lines come first.
 */
export function buildFilterSpec(definitions: readonly string[], filtersFile?: string): string {
  const lines: string[] = [];
  if (filtersFile) {
    lines.push(readTextFile(filtersFile));
  }
  lines.push(...definitions);
  return lines.join('\n');
}

export function createFiltersCommand(getLogger: () => Logger): Command {
  const cmd = new Command('filters')
    .description('Parse filter definitions and show the resulting predicates')
    .argument('[definitions...]', 'Filter definitions, e.g. "age>=18"')
    .option('--filters-file <path>', 'File with one filter definition per line')
    .action((definitions: string[], options: { filtersFile?: string }) => {
      try {
        const predicates = parseFilters(buildFilterSpec(definitions, options.filtersFile));
        getLogger().debug({ event: 'filters.parsed', filters: predicates.length });

        const lines = predicates.map(formatFilter);
        output(predicates, lines.length > 0 ? lines.join('\n') : '(no filters)');
      } catch (error) {
        if (!isSieveError(error)) throw error;
        outputError(error.message, error.code);
        process.exit(1);
      }
    });

  return cmd;
}
