/**
 * Rename Executor
 *
 * The only code that mutates the watched folder. Renames a file in place to
 * its target name, appending " (2)", " (3)", ... before the extension when
 * the name is taken.
 *
 * - Never deletes, truncates or copies: the single operation is fs.rename
 *   within one directory
 * - Never throws: every problem is reported as a `failed` outcome and the
 *   original is left where it was
 * - A target equal to the current path is a no-op success
 * - A target that is the same file under another case (case-insensitive
 *   volumes) is renamed directly
 */

import { lstat as fsLstat, rename as fsRename } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { dirname, join } from 'node:path';
import { CollisionExhaustedError, errorMessage, systemErrorCode } from '../errors.js';
import type { TargetFilename } from '../classification/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RenameOutcome =
  | { status: 'renamed'; newPath: string }
  | { status: 'collision-resolved'; newPath: string; suffix: number }
  | { status: 'failed'; reason: string; code: string };

/** Filesystem calls the executor needs; swapped out in tests */
export interface RenameFs {
  lstat(path: string): Promise<Pick<Stats, 'ino' | 'dev'>>;
  rename(from: string, to: string): Promise<void>;
}

export interface RenameOptions {
  /** Total names tried, the unsuffixed name included */
  maxCollisionAttempts: number;
  fs?: RenameFs;
}

const nodeRenameFs: RenameFs = {
  lstat: (path) => fsLstat(path),
  rename: (from, to) => fsRename(from, to),
};

/** Codes that mean the destination appeared between the check and the rename */
const TAKEN_CODES = new Set(['EEXIST', 'ENOTEMPTY']);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function candidateFilename(target: TargetFilename, attempt: number): string {
  if (attempt <= 1) return target.filename;
  return `${target.stem} (${attempt})${target.extension}`;
}

async function lstatOrNull(fs: RenameFs, path: string): Promise<Pick<Stats, 'ino' | 'dev'> | null> {
  try {
    return await fs.lstat(path);
  } catch (err) {
    if (systemErrorCode(err) === 'ENOENT') return null;
    throw err;
  }
}

function failed(err: unknown): RenameOutcome {
  return { status: 'failed', reason: errorMessage(err), code: systemErrorCode(err) ?? 'UNKNOWN' };
}

// ---------------------------------------------------------------------------
// Rename
// ---------------------------------------------------------------------------

/**
 * Rename `originalPath` to `target` within its directory.
 *
 * @returns The outcome; never rejects
 */
export async function applyRename(
  originalPath: string,
  target: TargetFilename,
  { maxCollisionAttempts, fs = nodeRenameFs }: RenameOptions,
): Promise<RenameOutcome> {
  const directory = dirname(originalPath);
  if (join(directory, target.filename) === originalPath) {
    return { status: 'renamed', newPath: originalPath };
  }

  let source: Pick<Stats, 'ino' | 'dev'>;
  try {
    source = await fs.lstat(originalPath);
  } catch (err) {
    return failed(err);
  }

  for (let attempt = 1; attempt <= maxCollisionAttempts; attempt++) {
    const candidate = join(directory, candidateFilename(target, attempt));
    if (candidate === originalPath) {
      return attempt === 1
        ? { status: 'renamed', newPath: candidate }
        : { status: 'collision-resolved', newPath: candidate, suffix: attempt };
    }

    try {
      const existing = await lstatOrNull(fs, candidate);
      const sameFile = existing !== null && existing.ino === source.ino && existing.dev === source.dev;
      if (existing !== null && !sameFile) continue;

      await fs.rename(originalPath, candidate);
    } catch (err) {
      if (TAKEN_CODES.has(systemErrorCode(err) ?? '')) continue;
      return failed(err);
    }

    return attempt === 1
      ? { status: 'renamed', newPath: candidate }
      : { status: 'collision-resolved', newPath: candidate, suffix: attempt };
  }

  const exhausted = new CollisionExhaustedError(target.filename, maxCollisionAttempts);
  return { status: 'failed', reason: exhausted.message, code: exhausted.code };
}
