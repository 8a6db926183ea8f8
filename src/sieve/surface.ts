/**
 * Host surface
 *
 * Entry points for callers that only consume text: the CSV on success,
 * otherwise the error message on a line of its own.
 */

import type { WriteFn } from './types.js';
import { isSieveError } from './errors.js';
import { processCsvData, processCsvFile } from './engine.js';

const writeStdout: WriteFn = (text) => {
  process.stdout.write(text);
};

export function emitCsvData(
  csvText: string,
  selectedColumnsSpec: string,
  filterSpec: string,
  write: WriteFn = writeStdout
): boolean {
  return emit(() => processCsvData(csvText, selectedColumnsSpec, filterSpec), write);
}

export function emitCsvFile(
  filePath: string,
  selectedColumnsSpec: string,
  filterSpec: string,
  write: WriteFn = writeStdout
): boolean {
  return emit(() => processCsvFile(filePath, selectedColumnsSpec, filterSpec), write);
}

function emit(run: () => string, write: WriteFn): boolean {
  let result: string;
  try {
    result = run();
  } catch (error) {
    if (!isSieveError(error)) throw error;
    write(`${error.message}\n`);
    return false;
  }
  write(result);
  return true;
}
