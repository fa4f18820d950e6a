/**
 * Shared utility functions used across the worklog packages.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { CONFIG_FILENAME } from './config.js';
import { IOError, isErrnoException } from './errors.js';

/** Zero-pad a number to two digits */
export function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Read a UTF-8 file, returning null if it doesn't exist.
 * Any other failure is an IOError.
 */
export function readTextIfExists(filePath: string, what = 'Cannot read file'): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw new IOError(what, filePath, { cause: error });
  }
}

/** Convert a platform path to forward slashes for Markdown links */
export function toPosixPath(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Get the root directory of the project (walks up to find .worklog.yml or .git).
 */
export function findProjectRoot(startDir: string): string {
  let dir = path.resolve(startDir);
  while (dir !== path.dirname(dir)) {
    if (
      fs.existsSync(path.join(dir, CONFIG_FILENAME)) ||
      fs.existsSync(path.join(dir, '.git'))
    ) {
      return dir;
    }
    dir = path.dirname(dir);
  }
  return path.resolve(startDir);
}
