/**
 * csvsieve CLI
 * Column selection and integer row filters for CSV
 *
 * Commands:
 *   csvsieve process [file]   # Select columns / filter rows
 *   csvsieve filters [defs]   # Check filter definitions
 */

import { Command, Option } from 'commander';
import { createRequire } from 'module';
import { setOutputOptions } from './utils/output.js';
import { createLogger, LOG_LEVELS, type Logger } from './utils/logger.js';
import { resolveLogLevel } from './utils/settings.js';
import { createProcessCommand, createFiltersCommand } from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');
const VERSION = packageJson.version;

const HELP_HEADER = `
csvsieve - select columns and filter rows of CSV data

Filter definitions:
  <column><operator><integer>   operators: != >= <= = > <
  One definition per line (or per --filter); all of them must hold.

Examples:
  csvsieve process data.csv -c name,age -f "age>=18"
  csvsieve process --data "$(cat data.csv)" -c age,name -f "age!=30"
  csvsieve filters "age>=18" "score<100"
`;

export function createProgram(): Command {
  const program = new Command();
  let logger: Logger = createLogger();

  program
    .name('csvsieve')
    .description('Select columns and filter rows of CSV data')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('-v, --verbose', 'Verbose output')
    .addOption(new Option('--log-level <level>', 'Minimum log level written to stderr').choices(LOG_LEVELS))
    .addHelpText('before', HELP_HEADER)
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ json?: boolean; verbose?: boolean; logLevel?: string }>();
      setOutputOptions({
        json: opts.json,
        verbose: opts.verbose,
      });
      logger = createLogger(undefined, resolveLogLevel(opts));
    });

  const getLogger = () => logger;

  program.addCommand(createProcessCommand(getLogger));
  program.addCommand(createFiltersCommand(getLogger));

  return program;
}
