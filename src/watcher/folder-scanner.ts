/**
 * Lists files already in the watched folder that still need a name.
 *
 * A file counts as already named when it follows one of the output
 * templates ("YYYY-MM-DD - ", "YYYY - ") or carries the Unprocessed prefix.
 */

import { readdir } from 'node:fs/promises';
import { extname } from 'node:path';
import { UNPROCESSED_PREFIX } from '../classification/naming.js';

const NAMED_PATTERNS = [/^\d{4}-\d{2}-\d{2} - /, /^\d{4} - /];

export function isAlreadyNamed(filename: string): boolean {
  return filename.startsWith(UNPROCESSED_PREFIX) || NAMED_PATTERNS.some((pattern) => pattern.test(filename));
}

/**
 * Filenames (not paths) of supported, not-yet-named files, sorted by name.
 */
export async function listUnprocessedFiles(
  folder: string,
  supportedExtensions: readonly string[],
): Promise<string[]> {
  const entries = await readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => supportedExtensions.includes(extname(name).toLowerCase()))
    .filter((name) => !isAlreadyNamed(name))
    .sort((a, b) => a.localeCompare(b));
}
