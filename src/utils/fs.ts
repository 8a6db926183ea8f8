/**
 * File system utilities
 */

import { readFileSync } from 'fs';
import { FileAccessError } from '../sieve/errors.js';

/**
 * Read a whole file as UTF-8 text
 * @throws FileAccessError when the file is missing or unreadable
 */
export function readTextFile(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FileAccessError(filePath, 'no such file');
    }
    throw new FileAccessError(filePath, error instanceof Error ? error.message : String(error));
  }
}
