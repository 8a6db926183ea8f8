/**
 * Output utilities for CLI
 */

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function resetOutputOptions(): void {
  globalOptions = {};
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

/**
 * Write text to stdout as-is (no trailing newline added)
 */
export function writeRaw(text: string): void {
  process.stdout.write(text);
}

/**
 * Report a failed sieve call.
 * Plain mode prints the message line on stdout so text consumers see it
 * in place of the CSV.
 */
export function outputError(message: string, code?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify({ error: message, code }));
  } else {
    console.log(message);
  }
}

/**
 * Report a usage problem (not a sieve failure) on stderr
 */
export function outputUsageError(message: string, error?: Error): void {
  console.error(`Error: ${message}`);
  if (error && globalOptions.verbose) {
    console.error(error.stack);
  }
}
