/**
 * Poppler Rasterizer
 *
 * Renders a single PDF page to PNG with Poppler's `pdftoppm`. Poppler is an
 * external prerequisite: either on PATH or pointed to by POPPLER_PATH (the
 * directory holding the executable, as on Windows installs).
 *
 * Output goes to a private temp directory that is always removed, so nothing
 * is left next to the scanned file.
 */

import { execFile } from 'node:child_process';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { promisify } from 'node:util';
import { ExtractionError, errorMessage, systemErrorCode } from '../errors.js';
import type { PdfRasterizer } from './types.js';

const execFileAsync = promisify(execFile);

/** A single page should never take this long; a hung pdftoppm is a bad file */
const RASTERIZE_TIMEOUT_MS = 60_000;

function pdftoppmBinary(popplerPath?: string): string {
  const executable = process.platform === 'win32' ? 'pdftoppm.exe' : 'pdftoppm';
  return popplerPath ? join(popplerPath, executable) : executable;
}

/**
 * Create a rasterizer backed by `pdftoppm`.
 *
 * @param popplerPath - Directory containing pdftoppm (omit to use PATH)
 */
export function createPopplerRasterizer(popplerPath?: string): PdfRasterizer {
  const binary = pdftoppmBinary(popplerPath);

  return async (pdfPath, { dpi, page = 1 }) => {
    const workDir = await mkdtemp(join(tmpdir(), 'scan-renamer-'));
    const outputRoot = join(workDir, 'page');

    try {
      await execFileAsync(
        binary,
        [
          '-png',
          '-r', String(dpi),
          '-f', String(page),
          '-l', String(page),
          '-singlefile',
          pdfPath,
          outputRoot,
        ],
        { timeout: RASTERIZE_TIMEOUT_MS },
      );
      return await readFile(`${outputRoot}.png`);
    } catch (err) {
      if (isMissingExecutable(err)) {
        throw new ExtractionError(
          'DECODE_FAILED',
          `pdftoppm not found (${binary}). Install Poppler or set POPPLER_PATH.`,
          { cause: err },
        );
      }
      throw new ExtractionError(
        'DECODE_FAILED',
        `pdftoppm could not render page ${page} of ${basename(pdfPath)}: ${errorMessage(err)}`,
        { cause: err },
      );
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  };
}

/** spawn() failing with ENOENT means the executable itself is missing */
function isMissingExecutable(err: unknown): boolean {
  return (
    systemErrorCode(err) === 'ENOENT' &&
    err instanceof Error &&
    'syscall' in err &&
    typeof err.syscall === 'string' &&
    err.syscall.startsWith('spawn')
  );
}

/**
 * Check that pdftoppm can be launched at all.
 * Only a missing executable counts as unavailable; `pdftoppm -v` exits
 * non-zero on some Poppler releases.
 */
export async function isPopplerAvailable(popplerPath?: string): Promise<boolean> {
  try {
    await execFileAsync(pdftoppmBinary(popplerPath), ['-v'], { timeout: 10_000 });
    return true;
  } catch (err) {
    return !isMissingExecutable(err);
  }
}
